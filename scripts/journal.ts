#!/usr/bin/env node
/**
 * journal.ts — Journal CLI
 *
 * Record entries and goals, and print analytics reports.
 *
 * Usage:
 *   npx tsx scripts/journal.ts <command> [args] [options]
 *
 * Commands:
 *   add <text>               Record an entry (--type career|general|...)
 *   goal <text>              Add a goal (--target YYYY-MM-DD)
 *   complete <id>            Mark a goal completed
 *   progress <id> <0-100>    Set goal progress
 *   report                   Comprehensive report (--weekly for the last 7 days)
 *   summary                  Recent entries, active goals and warnings
 *   career                   Career insights, skill suggestions and next steps
 *   stats                    Record counts
 *   export                   Full journal export as JSON
 *
 * Options:
 *   --file <path>            Journal document (default: settings.journalFile)
 *   --lexicon <path>         Replacement keyword lexicon (JSON)
 *   --format json|md         Report output format (default: md)
 *   --type <type>            Entry type for `add` (default: general)
 *   --target YYYY-MM-DD      Target date for `goal`
 *   --weekly                 Weekly report instead of the comprehensive one
 *
 * Settings come from JOURNAL_SETTINGS (a JSON file) and JOURNAL_* env vars.
 * With JOURNAL_DEBUG=true a fatal error also prints its stack.
 */

import { resolve } from "path";
import { parseArgs } from "util";

import * as log from "../src/log";
import { careerAdvice } from "../src/analyze/career";
import { JournalAnalytics } from "../src/analyze/report";
import { TextSignalExtractor } from "../src/analyze/signals";
import { memorySummary, recordEntry } from "../src/journal";
import { DEFAULT_LEXICON, loadLexiconFile } from "../src/lexicon";
import { renderComprehensiveReport, renderWeeklyReport } from "../src/render/renderer";
import { loadSettings } from "../src/settings/load";
import { JsonJournalStore } from "../src/store/journal-store";
import { NOOP_PATTERN_WRITER } from "../src/types";

type Format = "json" | "md";

function printJson(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

function parseFormat(value: string | undefined): Format {
	if (value === undefined || value === "md") return "md";
	if (value === "json") return "json";
	throw new Error(`Unknown format "${value}", expected json or md`);
}

function parseId(value: string | undefined): number {
	const id = Number(value);
	if (!Number.isInteger(id) || id < 1) throw new Error(`Invalid goal id: ${value ?? "(missing)"}`);
	return id;
}

function requireText(words: string[], command: string): string {
	const text = words.join(" ").trim();
	if (!text) throw new Error(`\`${command}\` needs some text`);
	return text;
}

function main(): void {
	const { values, positionals } = parseArgs({
		allowPositionals: true,
		options: {
			file: { type: "string" },
			lexicon: { type: "string" },
			format: { type: "string" },
			type: { type: "string" },
			target: { type: "string" },
			weekly: { type: "boolean", default: false },
		},
	});

	const settings = loadSettings();
	const store = new JsonJournalStore(resolve(values.file ?? settings.journalFile));
	const lexicon = values.lexicon ? loadLexiconFile(values.lexicon) : DEFAULT_LEXICON;
	const [command, ...rest] = positionals;
	log.debug(`command=${command ?? "(none)"} file=${store.filePath}`);

	switch (command) {
		case "add": {
			const result = recordEntry(store, requireText(rest, "add"), {
				type: values.type,
				extractor: new TextSignalExtractor(lexicon),
			});
			printJson(result);
			return;
		}
		case "goal":
			printJson(store.addGoal(requireText(rest, "goal"), values.target));
			return;
		case "complete": {
			const goal = store.completeGoal(parseId(rest[0]));
			if (!goal) throw new Error(`No goal with id ${rest[0]}`);
			printJson(goal);
			return;
		}
		case "progress": {
			const progress = Number(rest[1]);
			const goal = store.updateGoalProgress(parseId(rest[0]), progress);
			if (!goal) throw new Error(`No goal with id ${rest[0]}`);
			printJson(goal);
			return;
		}
		case "report": {
			const format = parseFormat(values.format);
			const analytics = new JournalAnalytics(store, {
				patterns: settings.writePatterns ? store : NOOP_PATTERN_WRITER,
				lexicon,
				config: settings,
			});
			if (values.weekly) {
				const report = analytics.weeklyReport();
				console.log(format === "json" ? JSON.stringify(report, null, 2) : renderWeeklyReport(report));
			} else {
				const report = analytics.comprehensiveReport();
				console.log(format === "json" ? JSON.stringify(report, null, 2) : renderComprehensiveReport(report));
			}
			return;
		}
		case "summary":
			printJson(memorySummary(store));
			return;
		case "career":
			printJson(careerAdvice(store.loadSnapshot(), new TextSignalExtractor(lexicon)));
			return;
		case "stats":
			printJson(store.getStats());
			return;
		case "export":
			printJson(store.exportData());
			return;
		default:
			throw new Error(`Unknown command: ${command ?? "(none)"}. Try add, goal, complete, progress, report, summary, career, stats or export.`);
	}
}

try {
	main();
} catch (e: unknown) {
	console.error("[journal] Fatal error:", e instanceof Error ? e.message : String(e));
	if (log.isDebugEnabled() && e instanceof Error && e.stack) {
		console.error(e.stack);
	}
	process.exit(1);
}
