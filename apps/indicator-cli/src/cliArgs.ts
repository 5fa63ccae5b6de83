export type ArgValue = string | boolean;

const FLAG_PREFIX = "--";

/**
 * Reads `--key value`, `--key=value` and bare `--flag` tokens. The first
 * positional token stands in for `--input`.
 */
export const parseCliArgs = (argv: readonly string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	let input: string | undefined;
	let index = 0;
	while (index < argv.length) {
		const token = argv[index];
		index += 1;
		if (!token.startsWith(FLAG_PREFIX)) {
			input ??= token;
			continue;
		}
		const body = token.slice(FLAG_PREFIX.length);
		const [key, inline] = splitOnce(body, "=");
		if (inline !== undefined) {
			args[key] = inline;
			continue;
		}
		const next = argv[index];
		if (next !== undefined && next !== "" && !next.startsWith(FLAG_PREFIX)) {
			args[key] = next;
			index += 1;
		} else {
			args[key] = true;
		}
	}
	if (input !== undefined && args.input === undefined) {
		args.input = input;
	}
	return args;
};

const splitOnce = (
	value: string,
	separator: string
): [head: string, tail: string | undefined] => {
	const at = value.indexOf(separator);
	return at === -1 ? [value, undefined] : [value.slice(0, at), value.slice(at + 1)];
};

export const readStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new Error(`--${key} expects a value`);
	}
	return value;
};

export const readFlag = (args: Record<string, ArgValue>, key: string): boolean =>
	args[key] === true || args[key] === "true";
