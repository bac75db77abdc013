import { NativeAttributeValue } from '@aws-sdk/util-dynamodb';
import { Item, SortOrder } from '../types/types';

/**
 * Projects every item onto the given attributes. Attributes an item does not
 * have are left out rather than set to undefined.
 */
export function selectItemsByAttrs(items: Item[], attrs: string[]): Item[] {
  return items.map(item => {
    const selected: Item = {};
    for (const attr of attrs) {
      if (attr in item) {
        selected[attr] = item[attr];
      }
    }
    return selected;
  });
}

/**
 * Stable multi-attribute sort; earlier entries in `order` take precedence.
 * Items missing an attribute sort after those that have it, in either direction.
 */
export function sortItemsByAttrs(items: Item[], order: SortOrder): Item[] {
  return [...items].sort((a, b) => {
    for (const [attr, direction] of order) {
      const left = a[attr];
      const right = b[attr];
      if (left === undefined && right === undefined) continue;
      if (left === undefined) return 1;
      if (right === undefined) return -1;
      const result = compareValues(left, right);
      if (result !== 0) {
        return direction === 'desc' ? -result : result;
      }
    }
    return 0;
  });
}

function compareValues(left: NativeAttributeValue, right: NativeAttributeValue): number {
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  if (typeof left === 'bigint' && typeof right === 'bigint') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (typeof left === 'boolean' && typeof right === 'boolean') {
    return Number(left) - Number(right);
  }
  const l = String(left);
  const r = String(right);
  return l < r ? -1 : l > r ? 1 : 0;
}
