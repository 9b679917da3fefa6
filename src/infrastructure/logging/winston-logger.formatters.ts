import * as winston from 'winston';
import { deepRedact, REDACTED, shouldRedact } from './utils/redaction.util';

const levelIcon: Record<string, string> = {
  error: '⛔',
  warn: '⚠',
  info: 'ℹ',
  http: '🌐',
  verbose: '🔍',
  debug: '🐞',
  silly: '✨',
};

// printed in the line prefix, not repeated as key=value details
const PREFIX_KEYS = new Set(['timestamp', 'level', 'message', 'context', 'trace', 'icon', 'runId']);

function humanizeValueInline(value: unknown): string {
  if (value == null) return String(value);
  if (Array.isArray(value)) return value.map(humanizeValueInline).join(', ');
  if (typeof value === 'object') return humanizeObjectInline(value);
  return String(value);
}

export function humanizeObjectInline(obj: object): string {
  const parts: string[] = [];
  for (const [k, v] of Object.entries(obj)) {
    parts.push(`${k}=${humanizeValueInline(v)}`);
  }
  return parts.join(' ');
}

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  if (!text.startsWith('{') || !text.endsWith('}')) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? { ...parsed }
      : undefined;
  } catch {
    return undefined;
  }
}

export const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'message' || key === 'level') continue;
    info[key] = shouldRedact(key) ? REDACTED : deepRedact(info[key]);
  }
  return info;
});

// must run before colorize, which rewrites `level`
const iconFormat = winston.format((info) => {
  info.icon = levelIcon[info.level] ?? '•';
  return info;
});

/** One line per entry: time, icon, level, [run], [context], message, then key=value details. */
export function formatPrettyLine(info: winston.Logform.TransformableInfo): string {
  const context = typeof info.context === 'string' ? info.context : undefined;
  const contextFields = context ? parseJsonObject(context) : undefined;
  const runId = typeof info.runId === 'string' ? info.runId : contextFields?.runId;

  const runPart = typeof runId === 'string' ? ` [run:${runId}]` : '';
  const contextLabel = context && !contextFields ? ` [${context}]` : '';

  const details: Record<string, unknown> = {};
  if (contextFields) {
    for (const [key, value] of Object.entries(contextFields)) {
      if (key !== 'runId') details[key] = value;
    }
  }
  for (const [key, value] of Object.entries(info)) {
    if (!PREFIX_KEYS.has(key)) details[key] = value;
  }

  const detailsPart = Object.keys(details).length ? ` ${humanizeObjectInline(details)}` : '';
  const icon = typeof info.icon === 'string' ? info.icon : '•';
  const tracePart = typeof info.trace === 'string' ? `\n${info.trace}` : '';
  const message = `${String(info.message)}${detailsPart}`.trim();

  const line = `${String(info.timestamp)} ${icon} ${info.level.toUpperCase().padEnd(7)}${runPart}${contextLabel}: ${message}`;
  return `${line}${tracePart}`.trimEnd();
}

export function makePrettyConsoleFormat() {
  return winston.format.combine(
    redactFormat(),
    iconFormat(),
    winston.format.colorize({ all: true }),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.printf(formatPrettyLine),
  );
}

export function makeJsonFileFormat() {
  return winston.format.combine(
    redactFormat(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  );
}
