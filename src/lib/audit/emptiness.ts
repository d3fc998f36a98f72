/**
 * Emptiness checks for required fields and default application.
 */

import type { FieldValue } from '../../types/work-item.js';

/**
 * Null, the empty string and the empty sequence count as "missing".
 */
export function isEmptyFieldValue(value: FieldValue | undefined): boolean {
  if (value === undefined) return true;
  switch (value.kind) {
    case 'null':
      return true;
    case 'string':
      return value.value === '';
    case 'sequence':
      return value.items.length === 0;
    default:
      return false;
  }
}
