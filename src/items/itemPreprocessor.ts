import { Item } from '../types/types';

/**
 * Normalizes an item before it is written. Implementations must be pure and
 * must not reach the backend.
 */
export interface ItemPreprocessor {
  preprocess(item: Item): Item;
}

/**
 * Removes attributes whose value is undefined, which DynamoDB rejects.
 */
export class DefaultItemPreprocessor implements ItemPreprocessor {
  preprocess(item: Item): Item {
    return Object.fromEntries(
      Object.entries(item).filter(([, value]) => value !== undefined)
    );
  }
}
