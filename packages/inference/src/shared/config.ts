import type { InferenceConfig, InferenceConfigOverrides } from "./types.js";

export class ConfigurationManager {
	static createDefault(): InferenceConfig {
		return {
			logging: {
				enabled: false,
				allowedIds: new Set<string>(),
				deniedIds: new Set([
					// "FORWARD_RULE_FIRED",
					"FORWARD_PASS_COMPLETE",
					"BACKWARD_RULE_TRY",
				]),
			},
			backward: {
				maxDepth: Number.POSITIVE_INFINITY,
			},
		};
	}

	static create(overrides: InferenceConfigOverrides = {}): InferenceConfig {
		const defaultConfig = ConfigurationManager.createDefault();
		return {
			logging: {
				...defaultConfig.logging,
				...overrides.logging,
				allowedIds:
					overrides.logging?.allowedIds || defaultConfig.logging.allowedIds,
				deniedIds:
					overrides.logging?.deniedIds || defaultConfig.logging.deniedIds,
			},
			backward: {
				...defaultConfig.backward,
				...overrides.backward,
			},
		};
	}
}
