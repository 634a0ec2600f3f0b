export interface InferenceConfig {
	readonly logging: LogConfig;
	readonly backward: BackwardConfig;
}

export interface LogConfig {
	readonly enabled: boolean;
	/** Empty means allow all. */
	readonly allowedIds: ReadonlySet<string>;
	readonly deniedIds: ReadonlySet<string>;
}

export interface BackwardConfig {
	/** Goals deeper than this on the active path are not expanded. */
	readonly maxDepth: number;
}

export interface InferenceConfigOverrides {
	readonly logging?: Partial<LogConfig>;
	readonly backward?: Partial<BackwardConfig>;
}

export type LogPayload = Record<string, unknown> | string;
