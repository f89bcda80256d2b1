/**
 * Escaping for journal text placed into a markdown note. Entries and goals
 * are typed freely, often pasted from a terminal, so anything that would
 * start a tag, an HTML element or a new table column is neutralized first.
 */

// eslint-disable-next-line no-control-regex
const TERMINAL_COLOR_RE = /\x1B\[[0-9;?]*[ -/]*[@-~]/g;
// eslint-disable-next-line no-control-regex
const OTHER_CONTROL_RE = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;

/** Drop terminal colour codes and stray control characters pasted into an entry. */
export function stripControlCodes(text: string): string {
	return text.replace(TERMINAL_COLOR_RE, "").replace(OTHER_CONTROL_RE, "");
}

/** Escape text for a bullet or paragraph; the result is always one line. */
export function escapeForMarkdown(text: string): string {
	return stripControlCodes(text)
		.replace(/\s*\r?\n\s*/g, " ")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		// "#word" would become a tag; "#3" and "C#" stay as typed
		.replace(/(^|[\s([])#(?=[A-Za-z])/g, "$1\\#");
}

export function escapeForTableCell(text: string): string {
	return escapeForMarkdown(text).replace(/\|/g, "\\|");
}

/** Frontmatter scalar: dates and date ranges stay bare, anything else is JSON-quoted. */
export function escapeForYaml(value: string): string {
	return /^[\w .-]+$/.test(value) ? value : JSON.stringify(value);
}
