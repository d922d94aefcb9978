import { Construct } from 'constructs'

type HookEvent = 'build' | 'deploy' | 'diff' | 'delete'
export type K8sConstructHook = `pre:${HookEvent}` | `post:${HookEvent}`
export type K8sConstructHookCallback = () => void | Promise<void>

export interface K8sHooks {
	addHook (hook: K8sConstructHook, cb: K8sConstructHookCallback): void
	runHook (hook: K8sConstructHook): Promise<void>
}

// mixin constructors have to take any[]
type ConstructConstructor<T extends Construct> = new (...args: any[]) => T

export function AddK8sHooks<T extends ConstructConstructor<Construct>> (constructor: T) {
	return class extends constructor implements K8sHooks {
		readonly #hooks: Partial<Record<K8sConstructHook, K8sConstructHookCallback[]>> = {}

		addHook (hook: K8sConstructHook, cb: K8sConstructHookCallback) {
			const cbs = this.#hooks[hook] ?? []
			cbs.push(cb)
			this.#hooks[hook] = cbs
		}

		async runHook (hook: K8sConstructHook) {
			const cbs = this.#hooks[hook] ?? []
			for (const cb of cbs) await cb()
		}
	}
}
