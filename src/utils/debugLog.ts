/**
 * debugLog.ts
 *
 * Structured runtime logger for mapping diagnostics.
 * - JSON-friendly entries kept in an in-memory summary (see getSummary)
 * - log(level, event, meta) plus debug/info/error helpers
 * - fallback(event, meta) records non-fatal degraded paths
 *   such as legacy predicate matches, separately from ordinary logs
 *
 * Gate: console output only when mapperConfigStore.config.debugLogging is on.
 * Entries are recorded regardless of the gate, up to config.maxLogEntries.
 */

import { getMapperConfig } from "../stores/mapperConfigStore";

export type LogLevel = "debug" | "info" | "error";
export type Meta = Record<string, unknown>;

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  meta: Meta;
}

export interface DebugSummary {
  startedAt: string;
  logs: LogEntry[];
  fallbacks: LogEntry[];
  counters: Record<string, number>;
}

function nowIso() { return new Date().toISOString(); }

function emptySummary(): DebugSummary {
  return { startedAt: nowIso(), logs: [], fallbacks: [], counters: {} };
}

let summary: DebugSummary = emptySummary();

function pushBounded(list: LogEntry[], entry: LogEntry) {
  list.push(entry);
  const max = getMapperConfig().maxLogEntries;
  while (list.length > max) list.shift();
}

function consoleFor(level: LogLevel, tag: string, entry: LogEntry) {
  if (!getMapperConfig().debugLogging) return;
  if (level === "debug") {
    console.debug(tag, entry.event, entry.meta, entry.ts);
  } else if (level === "info") {
    console.info(tag, entry.event, entry.meta, entry.ts);
  } else {
    console.error(tag, entry.event, entry.meta, entry.ts);
  }
}

function incr(counterName: string) {
  summary.counters[counterName] = (summary.counters[counterName] || 0) + 1;
}

export function log(level: LogLevel, eventName: string, meta?: Meta) {
  const entry: LogEntry = { ts: nowIso(), level, event: eventName, meta: meta || {} };
  pushBounded(summary.logs, entry);
  consoleFor(level, "[LR_LOG]", entry);
}

// convenience helpers
export function debug(event: string, meta?: Meta) { log("debug", event, meta); }
export function info(event: string, meta?: Meta) { log("info", event, meta); }
export function error(event: string, meta?: Meta) { log("error", event, meta); }

/**
 * fallback - record a degraded-but-valid path at info level. Kept apart from
 * `logs` so a caller can ask "did this load rely on legacy data?" without
 * filtering.
 */
export function fallback(eventName: string, meta?: Meta) {
  const entry: LogEntry = { ts: nowIso(), level: "info", event: eventName, meta: meta || {} };
  pushBounded(summary.fallbacks, entry);
  incr(eventName);
  consoleFor("info", "[LR_FALLBACK]", entry);
}

/** Deep copy of the current summary for tests and external tooling. */
export function getSummary(): DebugSummary {
  return {
    startedAt: summary.startedAt,
    logs: summary.logs.map((e) => ({ ...e, meta: { ...e.meta } })),
    fallbacks: summary.fallbacks.map((e) => ({ ...e, meta: { ...e.meta } })),
    counters: { ...summary.counters },
  };
}

export function resetSummary() {
  summary = emptySummary();
}
