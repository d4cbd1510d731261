export const assert = (condition: unknown, message?: string): void => {
	if (!condition) {
		const error = new Error();
		if (message) {
			console.error(`Assertion failed: ${message}`);
		} else {
			console.error('Assertion failed.');
		}
		console.error(error);
		process.exit(1);// Exit with a non-zero exit code to indicate an error.
	}
};

export const unixTime3Decimal = () => Math.floor(Date.now()) / 1000;

export const stringifyWithTabs = (value: unknown): string => {
	return JSON.stringify(value, null, '\t');
};
