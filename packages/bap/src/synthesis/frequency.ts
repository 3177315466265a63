import { ValidationError } from "@fis-bap/shared";

const DURATIONS = {
  daily: "P1D",
  weekly: "P1W",
  monthly: "P1M",
  quarterly: "P3M",
  yearly: "P1Y",
} as const;

export type Cadence = keyof typeof DURATIONS;

export interface CadenceInput {
  frequency: string;
  repeat: number;
  /** Day of the current month the schedule starts on. */
  day_number: number;
}

export function isCadence(value: string): value is Cadence {
  return Object.prototype.hasOwnProperty.call(DURATIONS, value);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * ISO-8601 repeating interval for a SIP schedule:
 * `R{repeat}/{YYYY-MM-DD}/{duration}`, starting on `day_number` of the
 * month `now` falls in.
 */
export function buildFrequency(input: CadenceInput, now: Date): string {
  if (!isCadence(input.frequency)) {
    throw new ValidationError("Invalid frequency selected");
  }
  if (!Number.isInteger(input.repeat) || input.repeat <= 0) {
    throw new ValidationError("repeat must be a positive integer");
  }

  const year = now.getFullYear();
  const month = now.getMonth();
  const daysInMonth = new Date(year, month + 1, 0).getDate();
  if (
    !Number.isInteger(input.day_number) ||
    input.day_number < 1 ||
    input.day_number > daysInMonth
  ) {
    throw new ValidationError("Invalid day number for current month");
  }

  const startDate = `${year}-${pad(month + 1)}-${pad(input.day_number)}`;
  return `R${input.repeat}/${startDate}/${DURATIONS[input.frequency]}`;
}
