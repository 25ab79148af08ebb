/**
 * Dynamic Value Generator
 *
 * Produces initStage variable values. `value` is template-resolved by the
 * caller before it gets here.
 *
 * @module execution
 */

import { randomUUID } from 'node:crypto';
import { ConfigurationError } from '../errors/index.js';
import { formatDate, formatParts } from '../utils/dateFormat.js';
import { ulid } from '../utils/ulid.js';
import { systemClock, type SystemClock } from '../utils/SystemClock.js';
import type { WorkflowVariableDefinition } from '../types/definitions.js';

const DEFAULT_TEXT_LENGTH = 16;
const TEXT_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const MS_PER_DAY = 86_400_000;
const LAST_MS_OF_DAY = MS_PER_DAY - 1;

export const DEFAULT_FORMATS = {
  dateTime: 'O',
  date: 'yyyy-MM-dd',
  time: 'HH:mm:ss',
} as const;

export interface DynamicValueGeneratorOptions {
  clock?: SystemClock;
  /** Uniform [0, 1) source */
  random?: () => number;
}

export class DynamicValueGenerator {
  private readonly clock: SystemClock;
  private readonly random: () => number;

  constructor(options: DynamicValueGeneratorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  /**
   * @param variable - Definition with `value` already resolved
   * @param index - 1-based position for Sequence variables
   * @throws {ConfigurationError} On missing fixed values or unparseable ranges
   */
  generate(variable: WorkflowVariableDefinition, index: number = 1): string {
    switch (variable.type) {
      case 'Fixed':
        if (variable.value === undefined || !variable.value.trim()) {
          throw ConfigurationError.invalidVariable(variable.name, 'Fixed variables require a value.');
        }
        return variable.value;
      case 'Number':
        return formatNumber(this.integerBetween(variable.min ?? 1, variable.max ?? 100), variable.padding);
      case 'Text':
        return this.text(variable.length ?? DEFAULT_TEXT_LENGTH);
      case 'Guid':
        return randomUUID();
      case 'Ulid':
        return ulid(this.clock.now());
      case 'DateTime':
        return this.dateTime(variable);
      case 'Date':
        return this.date(variable);
      case 'Time':
        return this.time(variable);
      case 'Sequence': {
        const step = Math.max(1, variable.step ?? 1);
        return formatNumber((variable.start ?? 1) + (index - 1) * step, variable.padding);
      }
    }
  }

  private integerBetween(min: number, max: number): number {
    const [low, high] = max < min ? [max, min] : [min, max];
    return low + Math.floor(this.random() * (high - low + 1));
  }

  private text(length: number): string {
    let result = '';
    for (let i = 0; i < length; i++) {
      result += TEXT_ALPHABET[Math.floor(this.random() * TEXT_ALPHABET.length)];
    }
    return result;
  }

  /**
   * Default window is one month either side of now; a single bound spans
   * one month from it
   */
  private dateTime(variable: WorkflowVariableDefinition): string {
    const from = parseInstant(variable.name, variable.fromDateTime);
    const to = parseInstant(variable.name, variable.toDateTime);
    const now = this.clock.now();

    const start = from ?? (to !== undefined ? addMonths(to, -1) : addMonths(now, -1));
    const end = to ?? (from !== undefined ? addMonths(start, 1) : addMonths(now, 1));
    const instant = this.integerBetween(start, end);
    return formatDate(new Date(instant), variable.format?.trim() || DEFAULT_FORMATS.dateTime);
  }

  private date(variable: WorkflowVariableDefinition): string {
    const from = parseDay(variable.name, variable.fromDate);
    const to = parseDay(variable.name, variable.toDate);
    const today = Math.floor(this.clock.now() / MS_PER_DAY) * MS_PER_DAY;

    const start = from ?? (to !== undefined ? addMonths(to, -1) : addMonths(today, -1));
    const end = to ?? (from !== undefined ? addMonths(start, 1) : addMonths(today, 1));
    const days = this.integerBetween(start / MS_PER_DAY, end / MS_PER_DAY);
    return formatDate(new Date(days * MS_PER_DAY), variable.format?.trim() || DEFAULT_FORMATS.date);
  }

  private time(variable: WorkflowVariableDefinition): string {
    const start = parseTimeOfDay(variable.name, variable.fromTime) ?? 0;
    const end = parseTimeOfDay(variable.name, variable.toTime) ?? LAST_MS_OF_DAY;
    const ms = this.integerBetween(start, end);

    return formatParts(
      {
        year: 1,
        month: 1,
        day: 1,
        hour: Math.floor(ms / 3_600_000),
        minute: Math.floor(ms / 60_000) % 60,
        second: Math.floor(ms / 1000) % 60,
        millisecond: ms % 1000,
      },
      variable.format?.trim() || DEFAULT_FORMATS.time,
    );
  }
}

function formatNumber(value: number, padding: number | undefined): string {
  if (padding !== undefined && padding >= 1) {
    const digits = String(Math.abs(value)).padStart(padding, '0');
    return value < 0 ? `-${digits}` : digits;
  }
  return String(value);
}

function addMonths(instant: number, months: number): number {
  const date = new Date(instant);
  date.setUTCMonth(date.getUTCMonth() + months);
  return date.getTime();
}

function parseInstant(variableName: string, text: string | undefined): number | undefined {
  if (text === undefined || !text.trim()) {
    return undefined;
  }
  const parsed = Date.parse(text);
  if (Number.isNaN(parsed)) {
    throw ConfigurationError.invalidVariable(variableName, `'${text}' is not a valid date and time.`);
  }
  return parsed;
}

function parseDay(variableName: string, text: string | undefined): number | undefined {
  if (text === undefined || !text.trim()) {
    return undefined;
  }
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text.trim());
  if (!match) {
    throw ConfigurationError.invalidVariable(variableName, `'${text}' is not a valid date (yyyy-MM-dd).`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

function parseTimeOfDay(variableName: string, text: string | undefined): number | undefined {
  if (text === undefined || !text.trim()) {
    return undefined;
  }
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(text.trim());
  const hours = Number(match?.[1]);
  const minutes = Number(match?.[2]);
  const seconds = Number(match?.[3] ?? 0);
  if (!match || hours > 23 || minutes > 59 || seconds > 59) {
    throw ConfigurationError.invalidVariable(variableName, `'${text}' is not a valid time (HH:mm:ss).`);
  }
  return ((hours * 60 + minutes) * 60 + seconds) * 1000;
}
