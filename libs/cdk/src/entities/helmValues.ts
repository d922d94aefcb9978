export type HelmValue = string | number | boolean
export interface HelmValues {
	[key: string]: HelmValue | HelmValues
}

/**
 * Splits a key written in `helm --set` syntax into its path segments.
 * Dots separate levels, an escaped dot (`\.`) stays part of the segment.
 */
export function splitHelmKey (key: string) {
	const segments: string[] = []
	let current = ''
	for (let i = 0; i < key.length; i++) {
		const char = key[i]
		if (char === '\\' && key[i + 1] === '.') {
			current += '.'
			i++
		} else if (char === '.') {
			segments.push(current)
			current = ''
		} else current += char
	}
	segments.push(current)
	if (segments.some((segment) => !segment)) throw new Error(`invalid helm value key: ${key}`)
	return segments
}

/**
 * Turns ordered `--set` style overrides into the nested values document helm reads with `-f`.
 * Later keys win over earlier ones, a key may not both hold a value and nest others.
 */
export function toHelmValues (overrides: Iterable<readonly [string, HelmValue]>) {
	const values: HelmValues = {}
	for (const [key, value] of overrides) {
		const segments = splitHelmKey(key)
		const leaf = segments[segments.length - 1]
		let node = values
		for (const segment of segments.slice(0, -1)) {
			const next = node[segment]
			if (next === undefined) {
				const created: HelmValues = {}
				node[segment] = created
				node = created
			} else if (typeof next === 'object') node = next
			else throw new Error(`helm value key ${key} nests under ${segment} which already holds a value`)
		}
		if (typeof node[leaf] === 'object') throw new Error(`helm value key ${key} would replace nested values`)
		node[leaf] = value
	}
	return values
}
