export type ArgValue = string | boolean;

export interface ParsedCliArgs {
	command: string | undefined;
	positionals: string[];
	args: Record<string, ArgValue>;
}

export const parseCliArgs = (argv: readonly string[]): ParsedCliArgs => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	const [command, ...rest] = positionals;
	return { command, positionals: rest, args };
};

export const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" ? value : undefined;
};

export const getFlag = (args: Record<string, ArgValue>, key: string): boolean =>
	args[key] === true || args[key] === "true";

export const getNumberArg = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const value = getStringArg(args, key);
	if (value === undefined) {
		return undefined;
	}
	const num = Number(value);
	if (!Number.isFinite(num)) {
		throw new Error(`Invalid numeric value for --${key}: ${value}`);
	}
	return num;
};
