// CHANGE: Pure reader for lcov tracefiles (the .info files produced by capture/merge/extract)
// WHY: The filtered tracefile is checked against the source root and summarized after rendering
// PURITY: CORE
// INVARIANT: Counts derived from DA/BRDA records win over LF/LH/BRF/BRH totals
// COMPLEXITY: O(n) where n = number of lines in the tracefile

import * as path from "node:path";

/**
 * Per-file totals of one `SF:` … `end_of_record` block.
 */
export interface TracefileRecord {
	readonly file: string;
	readonly linesFound: number;
	readonly linesHit: number;
	readonly branchesFound: number;
	readonly branchesHit: number;
}

/**
 * Aggregate over every record of a tracefile.
 *
 * @invariant linePercent, branchPercent ∈ [0, 100], rounded to two decimals
 */
export interface CoverageSummary {
	readonly files: number;
	readonly linesFound: number;
	readonly linesHit: number;
	readonly branchesFound: number;
	readonly branchesHit: number;
	readonly linePercent: number;
	readonly branchPercent: number;
}

interface RecordAccumulator {
	file: string | null;
	daFound: number;
	daHit: number;
	brdaFound: number;
	brdaHit: number;
	lf: number | null;
	lh: number | null;
	brf: number | null;
	brh: number | null;
}

const emptyAccumulator = (): RecordAccumulator => ({
	file: null,
	daFound: 0,
	daHit: 0,
	brdaFound: 0,
	brdaHit: 0,
	lf: null,
	lh: null,
	brf: null,
	brh: null,
});

function parseCount(raw: string | undefined): number | null {
	if (raw === undefined) return null;
	const value = Number.parseInt(raw, 10);
	return Number.isNaN(value) ? null : value;
}

// DA:<line>,<count>[,<checksum>]
function applyDA(acc: RecordAccumulator, body: string): void {
	const parts = body.split(",");
	if (parts.length < 2) return;
	acc.daFound += 1;
	const count = parseCount(parts[1]);
	if (count !== null && count > 0) acc.daHit += 1;
}

// BRDA:<line>,<block>,<branch>,<taken>; taken is "-" when the block never ran
function applyBRDA(acc: RecordAccumulator, body: string): void {
	const parts = body.split(",");
	if (parts.length < 4) return;
	acc.brdaFound += 1;
	const taken = parseCount(parts[3]);
	if (taken !== null && taken > 0) acc.brdaHit += 1;
}

function applyLine(acc: RecordAccumulator, line: string): void {
	const colon = line.indexOf(":");
	if (colon < 0) return;
	const key = line.slice(0, colon);
	const body = line.slice(colon + 1).trim();
	switch (key) {
		case "SF":
			acc.file = body;
			return;
		case "DA":
			applyDA(acc, body);
			return;
		case "BRDA":
			applyBRDA(acc, body);
			return;
		case "LF":
			acc.lf = parseCount(body);
			return;
		case "LH":
			acc.lh = parseCount(body);
			return;
		case "BRF":
			acc.brf = parseCount(body);
			return;
		case "BRH":
			acc.brh = parseCount(body);
			return;
		default:
			return;
	}
}

function finish(acc: RecordAccumulator): TracefileRecord | null {
	if (acc.file === null) return null;
	const useLineTotals = acc.daFound === 0 && acc.lf !== null;
	const useBranchTotals = acc.brdaFound === 0 && acc.brf !== null;
	return {
		file: acc.file,
		linesFound: useLineTotals ? (acc.lf ?? 0) : acc.daFound,
		linesHit: useLineTotals ? (acc.lh ?? 0) : acc.daHit,
		branchesFound: useBranchTotals ? (acc.brf ?? 0) : acc.brdaFound,
		branchesHit: useBranchTotals ? (acc.brh ?? 0) : acc.brdaHit,
	};
}

/**
 * Parse an lcov tracefile.
 *
 * Record structure:
 *   TN:<test name>
 *   SF:<absolute source file>
 *   DA:<line>,<count>      BRDA:<line>,<block>,<branch>,<taken>
 *   LF/LH, BRF/BRH         (totals, some emitters omit them)
 *   end_of_record
 *
 * Blocks without an SF line are dropped.
 */
export function parseTracefile(content: string): readonly TracefileRecord[] {
	const records: TracefileRecord[] = [];
	let acc = emptyAccumulator();

	for (const rawLine of content.split(/\r?\n/)) {
		const line = rawLine.trim();
		if (line.length === 0) continue;
		if (line === "end_of_record") {
			const record = finish(acc);
			if (record !== null) records.push(record);
			acc = emptyAccumulator();
			continue;
		}
		applyLine(acc, line);
	}

	// A trailing block without end_of_record still counts.
	const tail = finish(acc);
	if (tail !== null) records.push(tail);

	return records;
}

/**
 * True when `file` is `root` itself or lies below it.
 *
 * @pure true
 */
export function isUnderRoot(file: string, root: string): boolean {
	const relative = path.relative(root, file);
	const escapes = relative === ".." || relative.startsWith(`..${path.sep}`);
	return !escapes && !path.isAbsolute(relative);
}

/**
 * Files of a tracefile that lie outside `root`, in tracefile order.
 *
 * @postcondition ∀f ∈ result: ¬isUnderRoot(f, root)
 */
export function filesOutsideRoot(
	records: readonly TracefileRecord[],
	root: string,
): readonly string[] {
	return records.map((r) => r.file).filter((f) => !isUnderRoot(f, root));
}

const percent = (hit: number, found: number): number =>
	found > 0 ? Math.round((hit / found) * 10000) / 100 : 100;

/**
 * Aggregate totals over all records.
 *
 * @example
 * ```ts
 * summarize(parseTracefile("SF:/p/src/a.rs\nDA:1,1\nDA:2,0\nend_of_record\n"));
 * // { files: 1, linesFound: 2, linesHit: 1, linePercent: 50, branchPercent: 100, ... }
 * ```
 */
export function summarize(records: readonly TracefileRecord[]): CoverageSummary {
	let linesFound = 0;
	let linesHit = 0;
	let branchesFound = 0;
	let branchesHit = 0;
	for (const r of records) {
		linesFound += r.linesFound;
		linesHit += r.linesHit;
		branchesFound += r.branchesFound;
		branchesHit += r.branchesHit;
	}
	return {
		files: records.length,
		linesFound,
		linesHit,
		branchesFound,
		branchesHit,
		linePercent: percent(linesHit, linesFound),
		branchPercent: percent(branchesHit, branchesFound),
	};
}
