import util from "node:util";
import { ConfigurationManager } from "./config.js";
import type { LogConfig, LogPayload } from "./types.js";

export class Logger {
	constructor(
		private config: LogConfig,
		private sink: (...args: unknown[]) => void = console.log,
	) {}

	isEnabled(id: string): boolean {
		if (!this.config.enabled) return false;
		if (this.config.deniedIds.has(id)) return false;
		if (this.config.allowedIds.size > 0 && !this.config.allowedIds.has(id))
			return false;
		return true;
	}

	log(id: string, data: LogPayload | (() => LogPayload)): void {
		if (!this.isEnabled(id)) return;

		const out = typeof data === "function" ? data() : data;

		if (typeof out === "string") {
			this.sink(`[${id}] ${out}`);
		} else {
			this.sink(
				`[${id}]`,
				util.inspect(out, {
					depth: null,
					colors: false,
				}),
			);
		}
	}
}

let defaultLoggerInstance: Logger | null = null;

export function getDefaultLogger(): Logger {
	if (!defaultLoggerInstance) {
		defaultLoggerInstance = new Logger(
			ConfigurationManager.createDefault().logging,
		);
	}
	return defaultLoggerInstance;
}
