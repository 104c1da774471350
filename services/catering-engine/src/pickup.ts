import { format, isValid, subMinutes } from "date-fns";
import { assertNonNegativeNumber, InvariantViolation } from "./errors.js";

export const DEFAULT_READY_LEAD_MINUTES = 10;

export interface PickupWindow {
  pickupAt: Date;
  /** When the order must be packed and staged. */
  readyAt: Date;
  leadMinutes: number;
}

export function computePickupWindow(pickupAt: Date, leadMinutes = DEFAULT_READY_LEAD_MINUTES): PickupWindow {
  if (!isValid(pickupAt)) {
    throw new InvariantViolation("pickupAt must be a valid date", { pickupAt: String(pickupAt) });
  }
  assertNonNegativeNumber(leadMinutes, "leadMinutes");
  return { pickupAt, readyAt: subMinutes(pickupAt, leadMinutes), leadMinutes };
}

/** Local wall-clock time, e.g. "2026-10-19 07:30 AM". */
export function formatServiceTime(date: Date): string {
  return format(date, "yyyy-MM-dd hh:mm a");
}
