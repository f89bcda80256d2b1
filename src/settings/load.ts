import { existsSync, readFileSync } from "fs";
import * as log from "../log";
import { DEFAULT_SETTINGS, JournalSettings } from "./types";

type Env = Record<string, string | undefined>;

type NumberKey = {
	[K in keyof JournalSettings]: JournalSettings[K] extends number ? K : never;
}[keyof JournalSettings];
type BooleanKey = {
	[K in keyof JournalSettings]: JournalSettings[K] extends boolean ? K : never;
}[keyof JournalSettings];

const NUMBER_KEYS: readonly NumberKey[] = [
	"recentMoodEntries", "weeklyAverageWindow", "trendThreshold", "growthWindow",
	"skillWindow", "recentAchievements", "resilienceMinEvents", "resilienceLookahead",
	"inactivityThresholdDays", "completionRateThreshold", "weeklyWindowDays",
];
const BOOLEAN_KEYS: readonly BooleanKey[] = ["writePatterns", "debugMode"];

/**
 * Keep only known keys carrying a value of the expected type. Anything else
 * in a hand-edited settings file is dropped with a warning.
 */
export function pickKnownSettings(raw: unknown): Partial<JournalSettings> {
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return {};

	const entries = new Map<string, unknown>(Object.entries(raw));
	const picked: Partial<JournalSettings> = {};

	for (const key of NUMBER_KEYS) {
		const value = entries.get(key);
		entries.delete(key);
		if (value === undefined) continue;
		if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
			log.warn(`Ignoring setting "${key}": expected a non-negative number`);
			continue;
		}
		picked[key] = value;
	}

	for (const key of BOOLEAN_KEYS) {
		const value = entries.get(key);
		entries.delete(key);
		if (value === undefined) continue;
		if (typeof value !== "boolean") {
			log.warn(`Ignoring setting "${key}": expected a boolean`);
			continue;
		}
		picked[key] = value;
	}

	const journalFile = entries.get("journalFile");
	entries.delete("journalFile");
	if (typeof journalFile === "string" && journalFile.trim()) {
		picked.journalFile = journalFile;
	} else if (journalFile !== undefined) {
		log.warn(`Ignoring setting "journalFile": expected a non-empty string`);
	}

	for (const key of entries.keys()) {
		log.warn(`Ignoring unknown setting "${key}"`);
	}
	return picked;
}

function readSettingsFile(path: string): Partial<JournalSettings> {
	if (!existsSync(path)) return {};
	try {
		return pickKnownSettings(JSON.parse(readFileSync(path, "utf-8")));
	} catch (e) {
		log.warn(`Failed to read settings file ${path}, using defaults:`, e);
		return {};
	}
}

function parseBoolean(value: string): boolean {
	return value.toLowerCase() === "true" || value === "1";
}

/** Environment overrides: JOURNAL_FILE, JOURNAL_DEBUG, JOURNAL_WRITE_PATTERNS. */
function readEnvOverrides(env: Env): Partial<JournalSettings> {
	const overrides: Partial<JournalSettings> = {};
	if (env.JOURNAL_FILE) overrides.journalFile = env.JOURNAL_FILE;
	if (env.JOURNAL_DEBUG) overrides.debugMode = parseBoolean(env.JOURNAL_DEBUG);
	if (env.JOURNAL_WRITE_PATTERNS) overrides.writePatterns = parseBoolean(env.JOURNAL_WRITE_PATTERNS);
	return overrides;
}

/**
 * Resolve settings: defaults, then the JSON settings file (JOURNAL_SETTINGS,
 * when set), then environment overrides. Syncs the log debug gate.
 */
export function loadSettings(env: Env = process.env): JournalSettings {
	const saved = env.JOURNAL_SETTINGS ? readSettingsFile(env.JOURNAL_SETTINGS) : {};
	const settings: JournalSettings = Object.assign({}, DEFAULT_SETTINGS, saved, readEnvOverrides(env));
	log.setDebugEnabled(settings.debugMode);
	return settings;
}
