/**
 * Unit Conversion & Guest-Facing Rounding
 *
 * Pure numeric helpers that turn raw ounce / piece totals into the
 * quantities the kitchen actually reads: pounds, half-pound steps,
 * bag counts with an overflow remainder, and container counts.
 */

import { assertNonNegativeNumber, assertPositiveNumber } from "./errors.js";

const OUNCES_PER_POUND = 16;

/** Absorbs float noise such as 3.0000000004 before a ceiling. */
const CEIL_EPSILON = 1e-9;

/** Leftover weight at or below this is treated as an exact container count. */
const EXACT_CONTAINER_TOLERANCE_LB = 0.01;

export function ouncesToPounds(oz: number): number {
  assertNonNegativeNumber(oz, "oz");
  return oz / OUNCES_PER_POUND;
}

/** Smallest multiple of `increment` that is >= `x`. */
export function roundUpToIncrement(x: number, increment: number): number {
  assertNonNegativeNumber(x, "x");
  assertPositiveNumber(increment, "increment");
  return Math.ceil(x / increment) * increment;
}

/**
 * Round up to the next increment, except when the value is only a hair over
 * a clean number, which is reported as that clean number.
 *
 *   friendlyRoundUp(1.16) === 1.5
 *   friendlyRoundUp(5.01) === 5
 *   friendlyRoundUp(5.06) === 5.5
 */
export function friendlyRoundUp(x: number, increment = 0.5, tinyOverThreshold = 0.05): number {
  assertNonNegativeNumber(x, "x");
  assertPositiveNumber(increment, "increment");
  assertNonNegativeNumber(tinyOverThreshold, "tinyOverThreshold");

  const flooredValue = Math.floor(x / increment) * increment;
  if (x - flooredValue <= tinyOverThreshold) return flooredValue;
  return roundUpToIncrement(x, increment);
}

/** Ceiling that ignores float noise just above an integer. */
export function ceilCount(x: number): number {
  assertNonNegativeNumber(x, "x");
  return Math.ceil(x - CEIL_EPSILON);
}

/** Integers print plainly; anything else to at most two decimals. */
export function formatQuantity(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toFixed(2)));
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return count === 1 ? singular : plural;
}

function describeOunces(oz: number, ozPerPortion: number | undefined): string {
  const pounds = oz > 0 ? friendlyRoundUp(ouncesToPounds(oz)) : 0;
  if (ozPerPortion === undefined) return `${formatQuantity(pounds)} lb`;
  const portions = ceilCount(oz / ozPerPortion);
  return `${portions} ${pluralize(portions, "portion")} / ${formatQuantity(pounds)} lb`;
}

/**
 * Describe an ounce total against a bag size.
 *
 * Up to one bag (inclusive) the plain total is reported. Past one bag a
 * second line tells the cook how many bags to open plus the remainder.
 *
 *   bagOverflowDescription(97, 96, 6, "French Fries")
 *   // "French Fries: 97 oz (17 portions / 6.5 lb)\nOpen: 1 bag PLUS 1 oz (1 portion / 0.5 lb)"
 */
export function bagOverflowDescription(
  totalOz: number,
  ozPerBag: number,
  ozPerPortion: number | undefined,
  label: string,
): string {
  assertNonNegativeNumber(totalOz, "totalOz");
  assertPositiveNumber(ozPerBag, "ozPerBag");
  if (ozPerPortion !== undefined) assertPositiveNumber(ozPerPortion, "ozPerPortion");

  const main = `${label}: ${formatQuantity(totalOz)} oz (${describeOunces(totalOz, ozPerPortion)})`;
  if (totalOz <= ozPerBag + CEIL_EPSILON) return main;

  const fullBags = Math.floor(totalOz / ozPerBag);
  const remainderOz = totalOz - fullBags * ozPerBag;
  const open = `Open: ${fullBags} ${pluralize(fullBags, "bag")}`;

  if (remainderOz <= CEIL_EPSILON) return `${main}\n${open}`;
  return `${main}\n${open} PLUS ${formatQuantity(remainderOz)} oz (${describeOunces(remainderOz, ozPerPortion)})`;
}

export interface ContainerCount {
  totalPounds: number;
  fullContainers: number;
  leftoverPieces: number;
  /** True when the pieces fill whole containers (no remainder phrase). */
  exact: boolean;
}

/**
 * Convert a piece count to weight, then to whole containers plus leftover
 * pieces. A leftover of at most 0.01 lb counts as exactly N containers.
 */
export function containerCountFromPieceCount(
  pieceCount: number,
  ouncesPerPiece: number,
  containerPounds: number,
): ContainerCount {
  assertNonNegativeNumber(pieceCount, "pieceCount");
  assertPositiveNumber(ouncesPerPiece, "ouncesPerPiece");
  assertPositiveNumber(containerPounds, "containerPounds");

  const totalPounds = ouncesToPounds(pieceCount * ouncesPerPiece);
  const fullContainers = Math.floor(totalPounds / containerPounds + CEIL_EPSILON);
  const leftoverPounds = Math.max(0, totalPounds - fullContainers * containerPounds);

  if (leftoverPounds <= EXACT_CONTAINER_TOLERANCE_LB) {
    return { totalPounds, fullContainers, leftoverPieces: 0, exact: true };
  }

  const leftoverPieces = ceilCount((leftoverPounds * OUNCES_PER_POUND) / ouncesPerPiece);
  return { totalPounds, fullContainers, leftoverPieces, exact: false };
}
