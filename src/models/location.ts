/**
 * Location geometry
 *
 * A Location is a rectangle in page-relative coordinates (every component is
 * a fraction 0..1 of the page), optionally carrying the uids of the OCR words
 * it was derived from.
 *
 * @module models/location
 */

import { z } from 'zod';
import { ValidationError } from '../utils/validation.js';

export const LocationSchema = z.object({
  top: z.number().default(0),
  left: z.number().default(0),
  height: z.number().default(0),
  width: z.number().default(0),
  page: z.number().int().min(0).default(0),
  uids: z.array(z.string()).optional(),
});

export type Location = z.infer<typeof LocationSchema>;

export const CellSchema = z.object({
  row: z.number().int(),
  column: z.number().int(),
});

export type Cell = z.infer<typeof CellSchema>;

/**
 * Minimal rectangle enclosing every input. All inputs must be on one page.
 * A single location comes back unchanged.
 */
export function combineLocations(...locations: Location[]): Location {
  if (locations.length === 0) {
    throw new ValidationError('Cannot combine an empty list of locations');
  }
  if (locations.length === 1) {
    return locations[0];
  }

  const pages = new Set(locations.map((l) => l.page));
  if (pages.size !== 1) {
    throw new ValidationError(
      `All locations must be on the same page: ${[...pages].sort((a, b) => a - b).join(', ')}`
    );
  }

  const top = Math.min(...locations.map((l) => l.top));
  const left = Math.min(...locations.map((l) => l.left));
  const bottom = Math.max(...locations.map((l) => l.top + l.height));
  const right = Math.max(...locations.map((l) => l.left + l.width));

  const combined: Location = {
    top,
    left,
    height: bottom - top,
    width: right - left,
    page: locations[0].page,
  };

  if (locations.every((l) => l.uids !== undefined)) {
    combined.uids = locations.flatMap((l) => l.uids ?? []);
  }
  return combined;
}

/**
 * 1-D projection test. Touching edges overlap.
 */
export function isOverlapping(start1: number, length1: number, start2: number, length2: number): boolean {
  return start1 + length1 >= start2 && start2 + length2 >= start1;
}

/**
 * Two locations overlap when they share a page and their projections
 * intersect on both axes.
 */
export function isLocationOverlapping(a: Location, b: Location): boolean {
  return (
    a.page === b.page &&
    isOverlapping(a.left, a.width, b.left, b.width) &&
    isOverlapping(a.top, a.height, b.top, b.height)
  );
}

/**
 * Grow a location by `margin` on every side.
 */
export function expandLocation(location: Location, margin: number = 0.005): Location {
  return {
    ...location,
    top: location.top - margin,
    left: location.left - margin,
    height: location.height + 2 * margin,
    width: location.width + 2 * margin,
  };
}
