/**
 * packages/core/src/render/regionContent.ts — Text for the header, main and footer regions.
 *
 * Pure string builders; the coordinator hands their output to the region's
 * ContentBuffer, which wraps and fingerprints it.
 */

import { measureTextCells, splitAtCells, takeTailCells } from "../layout/textMeasure.js";
import type { AppStatistics, NormalizedSnapshot } from "./snapshot.js";

export const COMMAND_PROMPT = "Command: ";
export const COMMAND_CURSOR = "_";
export const DISPLAY_MODE_HINT = "Press Tab to switch to input mode";
export const INPUT_MODE_HINT = "Press Tab to switch to display mode, Enter to execute";
export const PROCESSING_FOOTNOTE = "Please wait while the operation completes...";
export const PROGRESS_BAR_WIDTH = 40;

const LAST_COMMAND_PREVIEW = 20;
const PROGRESS_FILLED = "█";
const PROGRESS_EMPTY = "░";

/**
 * Header text: the title, then `author - vVERSION`.
 * Empty parts are left out; with neither author nor version the second line is dropped.
 */
export function formatHeader(title: string, author: string, version: string): string {
  const lines: string[] = [];
  if (title.length > 0) lines.push(title);
  const byline: string[] = [];
  if (author.length > 0) byline.push(author);
  if (version.length > 0) byline.push(`v${version}`);
  if (byline.length > 0) lines.push(byline.join(" - "));
  return lines.join("\n");
}

function lastCommandPreview(cmd: string): string {
  if (cmd.length <= LAST_COMMAND_PREVIEW) return cmd;
  return `${cmd.slice(0, LAST_COMMAND_PREVIEW)}...`;
}

/** `Commands: N | Last: CMD` and `Content lines: N | Uptime: Ns`. */
export function formatStatistics(stats: AppStatistics): readonly string[] {
  let commands = `Commands: ${stats.totalCommands}`;
  if (stats.lastCommand.length > 0) commands += ` | Last: ${lastCommandPreview(stats.lastCommand)}`;
  const uptime = Math.max(0, Math.floor(stats.uptimeSec));
  return Object.freeze([commands, `Content lines: ${stats.contentLines} | Uptime: ${uptime}s`]);
}

/**
 * Prompt line for input mode.
 *
 * The cursor is appended while the line is shorter than `width`; input that
 * does not fit is shown by its tail, keeping the prompt and the cursor.
 */
export function formatCommandLine(input: string, width: number): string {
  let line = `${COMMAND_PROMPT}${input}`;
  if (measureTextCells(line) < width) line += COMMAND_CURSOR;
  if (measureTextCells(line) <= width) return line;

  const available = width - COMMAND_PROMPT.length - COMMAND_CURSOR.length;
  if (available > 0) return `${COMMAND_PROMPT}${takeTailCells(input, available)}${COMMAND_CURSOR}`;
  const [head] = splitAtCells(line, width);
  return head;
}

/** Footer lines for the current mode, each cut to `width`. */
export function formatFooter(snapshot: NormalizedSnapshot, width: number): readonly string[] {
  const lines: string[] = [];
  if (snapshot.mode === "input") {
    lines.push(formatCommandLine(snapshot.commandInput, width));
    lines.push(INPUT_MODE_HINT);
  } else {
    if (snapshot.status.length > 0) lines.push(`Status: ${snapshot.status}`);
    if (snapshot.statistics !== null) lines.push(...formatStatistics(snapshot.statistics));
    if (lines.length <= 1) lines.push(DISPLAY_MODE_HINT);
  }
  return Object.freeze(lines.map((line) => splitAtCells(line, Math.max(0, width))[0]));
}

/** Body text, preceded by `[Status: STATUS]` and a blank line when a status is given. */
export function formatBodyWithStatus(body: string, status: string): string {
  if (status.length === 0) return body;
  return `[Status: ${status}]\n\n${body}`;
}

/** `Progress: [####....] N%` over a fixed-width bar; progress is clamped to [0, 1]. */
export function formatProgressBar(progress: number): string {
  const fraction = Number.isFinite(progress) ? Math.min(1, Math.max(0, progress)) : 0;
  const filled = Math.floor(PROGRESS_BAR_WIDTH * fraction);
  const bar = PROGRESS_FILLED.repeat(filled) + PROGRESS_EMPTY.repeat(PROGRESS_BAR_WIDTH - filled);
  return `Progress: [${bar}] ${Math.trunc(fraction * 100)}%`;
}

export function formatProcessingStatus(message: string, progress?: number): string {
  const lines = [`Processing: ${message}`, ""];
  if (progress !== undefined) lines.push(formatProgressBar(progress), "");
  lines.push(PROCESSING_FOOTNOTE);
  return lines.join("\n");
}

/** Main region text: the processing notice while one is set, else the body. */
export function formatMainBody(snapshot: NormalizedSnapshot): string {
  const { processing } = snapshot;
  if (processing !== null) return formatProcessingStatus(processing.message, processing.progress);
  return formatBodyWithStatus(snapshot.bodyText, snapshot.bodyStatus);
}
