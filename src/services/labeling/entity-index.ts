/**
 * Evidence index
 *
 * Maps OCR word uids to the entities built from them, to answer "which
 * entities are supported by exactly (or some of, or more than) these words".
 * Built once per document with `EntityIndex.build`, then queried with `find`.
 *
 * @module services/labeling/entity-index
 */

import type { PlatformEntity } from '../../models/wire.js';

export interface FindOptions {
  /** Select entities supported by only some of the words */
  matchSubsets?: boolean;
  /** Select entities that also cover words beyond the input */
  matchSupersets?: boolean;
}

export class EntityIndex {
  private constructor(
    readonly entities: readonly PlatformEntity[],
    private readonly indicesByWordUid: ReadonlyMap<string, readonly number[]>
  ) {}

  /**
   * Index entities by their source word uids. Cost is linear in the total
   * number of source word references.
   */
  static build(entities: readonly PlatformEntity[]): EntityIndex {
    const byWord = new Map<string, number[]>();
    entities.forEach((entity, i) => {
      for (const uid of entity.source_word_uids) {
        const list = byWord.get(uid);
        if (list) {
          list.push(i);
        } else {
          byWord.set(uid, [i]);
        }
      }
    });
    return new EntityIndex(entities, byWord);
  }

  get size(): number {
    return this.entities.length;
  }

  /**
   * Entities whose source words match `words`. With no options, an entity
   * matches only when its source words are exactly the input. Results are
   * deduplicated and ordered by the entity's position in the build input.
   */
  find(words: ReadonlyArray<{ uid: string }>, options: FindOptions = {}): PlatformEntity[] {
    const { matchSubsets = false, matchSupersets = false } = options;

    const counts = new Map<number, number>();
    for (const word of words) {
      for (const i of this.indicesByWordUid.get(word.uid) ?? []) {
        counts.set(i, (counts.get(i) ?? 0) + 1);
      }
    }

    const selected: number[] = [];
    for (const [i, count] of counts) {
      if (!matchSubsets && count < words.length) continue;
      if (!matchSupersets && this.entities[i].source_word_uids.length > words.length) continue;
      selected.push(i);
    }

    return selected.sort((a, b) => a - b).map((i) => this.entities[i]);
  }
}
