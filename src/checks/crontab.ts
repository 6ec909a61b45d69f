import { MalformedDefinitionError } from "../core/errors.js";

export type CrontabFormat = "system" | "user";

export interface CronEntry {
  /** 1-based line number in the definition file. */
  line: number;
  schedule: string;
  /** Account the command runs as; null for user crontabs until the caller assigns the owner. */
  user: string | null;
  command: string;
}

export interface ParsedCrontab {
  entries: CronEntry[];
  malformedLines: number[];
}

const ASSIGNMENT_RE = /^[A-Za-z_][A-Za-z0-9_]*\s*=/;
const SPECIAL_SCHEDULE_RE = /^@(?:reboot|yearly|annually|monthly|weekly|daily|midnight|hourly|every_minute|every_second)$/i;
const SCHEDULE_FIELD_RE = /^(?:[\d*/,-]+|[A-Za-z]{3}(?:[-,][A-Za-z]{3})*)$/;

/** Splits off `count` whitespace-separated fields, keeping the remainder verbatim. */
function splitFields(line: string, count: number): { fields: string[]; rest: string } | null {
  const fields: string[] = [];
  let rest = line;
  for (let i = 0; i < count; i++) {
    const match = /^(\S+)\s+/.exec(rest);
    if (!match) return null;
    fields.push(match[1]);
    rest = rest.slice(match[0].length);
  }
  return { fields, rest: rest.trim() };
}

function parseLine(line: string, format: CrontabFormat): Omit<CronEntry, "line"> | null {
  const userColumns = format === "system" ? 1 : 0;
  const first = line.split(/\s/, 1)[0];

  const scheduleColumns = SPECIAL_SCHEDULE_RE.test(first) ? 1 : 5;
  const split = splitFields(line, scheduleColumns + userColumns);
  if (!split || !split.rest) return null;

  const schedule = split.fields.slice(0, scheduleColumns);
  if (scheduleColumns === 5 && !schedule.every((f) => SCHEDULE_FIELD_RE.test(f))) return null;

  return {
    schedule: schedule.join(" "),
    user: userColumns === 1 ? split.fields[scheduleColumns] : null,
    command: split.rest,
  };
}

/**
 * Parses a cron(5) definition. Lines that do not parse are reported, not
 * fatal; a file that is binary, or has content but no parseable entry, is.
 */
export function parseCrontab(path: string, content: Buffer, format: CrontabFormat): ParsedCrontab {
  if (content.includes(0)) {
    throw new MalformedDefinitionError(path, "binary content");
  }

  const result: ParsedCrontab = { entries: [], malformedLines: [] };
  const lines = content.toString("utf-8").split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line || line.startsWith("#") || ASSIGNMENT_RE.test(line)) continue;

    const parsed = parseLine(line, format);
    if (parsed) {
      result.entries.push({ line: i + 1, ...parsed });
    } else {
      result.malformedLines.push(i + 1);
    }
  }

  if (result.entries.length === 0 && result.malformedLines.length > 0) {
    throw new MalformedDefinitionError(path, `no parseable entries (lines ${result.malformedLines.join(", ")})`);
  }
  return result;
}
