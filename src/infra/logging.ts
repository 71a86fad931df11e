type ConsoleMethod = "log" | "info" | "warn" | "error" | "debug";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const METHODS: ConsoleMethod[] = ["log", "info", "warn", "error", "debug"];

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

const METHOD_RANK: Record<ConsoleMethod, number> = {
	debug: LEVEL_RANK.debug,
	log: LEVEL_RANK.info,
	info: LEVEL_RANK.info,
	warn: LEVEL_RANK.warn,
	error: LEVEL_RANK.error,
};

let installed = false;

export function parseLogLevel(value: string | undefined): LogLevel {
	switch ((value ?? "").trim().toLowerCase()) {
		case "debug":
			return "debug";
		case "warn":
			return "warn";
		case "error":
			return "error";
		case "silent":
			return "silent";
		default:
			return "info";
	}
}

export function installTimestampedConsole(level: LogLevel = "info"): void {
	if (installed) {
		return;
	}
	installed = true;
	const threshold = LEVEL_RANK[level];

	for (const method of METHODS) {
		const original = console[method].bind(console);
		console[method] = ((...args: Parameters<typeof original>) => {
			if (METHOD_RANK[method] < threshold) {
				return;
			}
			const timestamp = new Date().toISOString();
			if (args.length === 0) {
				original(`[${timestamp}]`);
				return;
			}

			const [first, ...rest] = args;
			if (typeof first === "string") {
				original(`[${timestamp}] ${first}`, ...rest);
			} else {
				original(`[${timestamp}]`, first, ...rest);
			}
		}) as typeof console[typeof method];
	}
}
