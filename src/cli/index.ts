import config from './config.js';
import { runDemo } from './demo.js';
import { assert, stringifyWithTabs } from '../utils/util.js';

async function main() {
	const { rotations, violations } = runDemo({
		values: config.DEMO_VALUES,
		remove: config.DEMO_REMOVE,
		overrideMode: config.OVERRIDE_MODE,
		enableConsoleDebugLog: config.CONSOLE_DEBUG_LOG,
		write: (line) => console.log(line),
	});
	config.CONSOLE_DEBUG_LOG && console.log(`Rotations: ${rotations}.`);
	assert(violations.length === 0, `Red-black invariants broken:\n${stringifyWithTabs(violations)}`);
}

main().catch((err) => {
	console.error('Demo failed:', err);
	process.exit(1);
});
