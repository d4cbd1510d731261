export const DEFAULT_DEMO_VALUES: readonly number[] = Object.freeze([12, 1, 9, 2, 0, 11, 7, 19, 4, 15, 18, 5, 14, 13, 10, 16, 6, 3, 8, 17]);
export const DEFAULT_DEMO_REMOVE: readonly number[] = Object.freeze([12]);

export function parseNumberList(name: string, json: string | undefined, fallback: readonly number[]): readonly number[] {
	if (!json) {
		return fallback;
	}
	try {
		const parsed: unknown = JSON.parse(json);
		if (!Array.isArray(parsed) || !parsed.every((item): item is number => typeof item === 'number' && Number.isFinite(item))) {
			console.error(`${name} environment variable is not a JSON array of numbers.`);
			return fallback;
		}
		return Object.freeze(parsed);
	} catch (error) {
		console.error(`Failed to parse environment variable ${name}:`, error);
		return fallback;
	}
}

export function loadConfig(env: NodeJS.ProcessEnv) {
	return Object.freeze({
		CONSOLE_DEBUG_LOG: env.CONSOLE_DEBUG_LOG === 'true',
		OVERRIDE_MODE: env.OVERRIDE_MODE ? env.OVERRIDE_MODE === 'true' : true,
		DEMO_VALUES: parseNumberList('DEMO_VALUES', env.DEMO_VALUES, DEFAULT_DEMO_VALUES),
		DEMO_REMOVE: parseNumberList('DEMO_REMOVE', env.DEMO_REMOVE, DEFAULT_DEMO_REMOVE),
	});
}

export type Config = ReturnType<typeof loadConfig>;

const config = loadConfig(process.env);

if (config.CONSOLE_DEBUG_LOG) {
	console.log('CONSOLE_DEBUG_LOG:', config.CONSOLE_DEBUG_LOG);
	console.log('OVERRIDE_MODE:', config.OVERRIDE_MODE);
	console.log('DEMO_VALUES:', config.DEMO_VALUES);
	console.log('DEMO_REMOVE:', config.DEMO_REMOVE);
}

export default config;
