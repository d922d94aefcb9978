import pino, { type Logger, type LevelWithSilent } from 'pino'

export const logger = pino({
	name: 'k8s-cdk',
	level: process.env.K8S_CDK_LOG_LEVEL ?? 'info',
})

const children: Logger[] = []

export function createLogger (component: string) {
	const child = logger.child({ component })
	children.push(child)
	return child
}

// children keep the level they were created with, so they are updated alongside the root
export function setLogLevel (level: LevelWithSilent) {
	logger.level = level
	children.forEach((child) => child.level = level)
}
