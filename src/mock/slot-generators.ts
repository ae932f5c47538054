/**
 * Slot value generation for mock templates.
 */

import type { SlotSpec } from '../settings/types.js';
import type { RandomSource } from './seeded-random.js';

export function generateSlotValue(spec: SlotSpec, random: RandomSource): string {
  switch (spec.kind) {
    case 'int':
      return String(random.int(spec.min, spec.max));
    case 'float':
      return (spec.min + random.next() * (spec.max - spec.min)).toFixed(spec.precision);
    case 'choice':
      return random.choice(spec.options);
  }
}

/**
 * Values in declared slot order, so a seed maps to one fixed rendering
 */
export function generateSlotValues(
  slots: Readonly<Record<string, SlotSpec>>,
  random: RandomSource
): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [name, spec] of Object.entries(slots)) {
    values[name] = generateSlotValue(spec, random);
  }
  return values;
}
