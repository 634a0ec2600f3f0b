import { RuleSet } from "@faultline/inference";

/**
 * Atoms starting with this prefix are fault hypotheses.
 */
export const FAULT_PREFIX = "fault_";

/**
 * Permissive rules for exploratory hypothesis generation.
 */
export const FORWARD_RULES = RuleSet.of(
	[
		{
			antecedents: ["battery_low"],
			consequent: "power_unstable",
			description: "Low battery can cause unstable power",
		},
		{
			antecedents: ["power_unstable"],
			consequent: "system_restarts",
			description: "Unstable power can trigger restarts",
		},
		{
			antecedents: ["no_wifi", "router_off"],
			consequent: "network_down",
			description: "No WiFi and router off implies network down",
		},
		{
			antecedents: ["network_down"],
			consequent: "cannot_sync",
			description: "If the network is down, syncing fails",
		},
		// fault hypotheses
		{
			antecedents: ["power_unstable"],
			consequent: "fault_power_supply",
			description: "Unstable power suggests power supply fault",
		},
		{
			antecedents: ["battery_low", "charging_not_working"],
			consequent: "fault_battery",
			description: "Low battery + charging not working suggests battery fault",
		},
		{
			antecedents: ["network_down"],
			consequent: "fault_network",
			description: "Network down suggests network fault",
		},
	],
	"forward",
);

/**
 * Stricter rules: a fault needs stronger evidence before it is proved.
 */
export const BACKWARD_RULES = RuleSet.of(
	[
		{
			antecedents: ["battery_low"],
			consequent: "power_unstable",
			description: "Low battery can cause unstable power",
		},
		{
			antecedents: ["mains_fluctuation"],
			consequent: "power_unstable",
			description: "Mains fluctuation can cause unstable power",
		},
		{
			antecedents: ["power_unstable"],
			consequent: "system_restarts",
			description: "Unstable power can trigger restarts",
		},
		{
			antecedents: ["interference", "weak_signal"],
			consequent: "no_wifi",
			description: "Interference and weak signal cause Wi‑Fi loss",
		},
		{
			antecedents: ["no_wifi", "router_off"],
			consequent: "network_down",
			description: "Router off with no Wi‑Fi implies network is down",
		},
		{
			antecedents: ["network_down"],
			consequent: "cannot_sync",
			description: "No network means syncing fails",
		},
		// fault hypotheses
		{
			antecedents: ["power_unstable", "system_restarts"],
			consequent: "fault_power_supply",
			description: "Unstable power AND restarts indicate power supply fault",
		},
		{
			antecedents: ["battery_low", "charging_not_working", "old_battery"],
			consequent: "fault_battery",
			description: "Low, not charging, and aged battery indicates battery fault",
		},
		{
			antecedents: ["no_wifi", "router_off", "cannot_sync"],
			consequent: "fault_network",
			description:
				"No Wi‑Fi, router off, and cannot sync indicates network fault",
		},
	],
	"backward",
);
