import { TAB20_PALETTE } from '../constants';
import { orderKeys } from './pivot';

/**
 * Assign a colour to every key. Keys are sorted first, so the same set of
 * keys gets the same colours whatever order it arrives in. The palette
 * cycles once there are more keys than colours.
 */
export function assignColors(
  keys: readonly string[],
  palette: readonly string[] = TAB20_PALETTE
): Map<string, string> {
  if (palette.length === 0) {
    throw new RangeError('Palette must contain at least one colour');
  }
  const colors = new Map<string, string>();
  orderKeys(keys, 'sorted').forEach((key, index) => {
    colors.set(key, palette[index % palette.length]);
  });
  return colors;
}
