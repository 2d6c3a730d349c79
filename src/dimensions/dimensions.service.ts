import { Injectable } from '@nestjs/common';
import { createHash } from 'crypto';
import { ContentNode } from '../content-repository/interfaces/content-repository.interface';
import { DimensionCombination, DimensionValues } from './interfaces/dimension.interface';

export const DEFAULT_DIMENSIONS_HASH = 'default';

/**
 * Hashes dimension combinations into the partition keys used for index names and bulk
 * batching, and remembers every combination hashed since the last reset so a flush
 * knows which dimension context to activate for each partition.
 */
@Injectable()
export class DimensionsService {
  private readonly dimensionsRegistry = new Map<string, DimensionCombination>();

  /**
   * Only the first (target) value of each dimension contributes to the hash, so
   * `{ language: ['de', 'en'] }` and `{ language: 'de' }` share a partition.
   */
  hash(dimensionValues: DimensionValues): string {
    const targetDimensions = this.toTargetDimensions(dimensionValues);

    if (Object.keys(targetDimensions).length === 0) {
      this.dimensionsRegistry.set(DEFAULT_DIMENSIONS_HASH, {});
      return DEFAULT_DIMENSIONS_HASH;
    }

    const hash = createHash('md5').update(JSON.stringify(targetDimensions)).digest('hex');
    this.dimensionsRegistry.set(hash, targetDimensions);

    return hash;
  }

  hashByNode(node: ContentNode): string {
    return this.hash(node.targetDimensions);
  }

  getDimensionsRegistry(): ReadonlyMap<string, DimensionCombination> {
    return this.dimensionsRegistry;
  }

  reset(): void {
    this.dimensionsRegistry.clear();
  }

  private toTargetDimensions(dimensionValues: DimensionValues): DimensionCombination {
    const targetDimensions: DimensionCombination = {};

    for (const dimensionName of Object.keys(dimensionValues).sort()) {
      const values = dimensionValues[dimensionName];
      const targetValue = typeof values === 'string' ? values : values[0];
      if (targetValue === undefined) {
        continue;
      }
      targetDimensions[dimensionName] = [targetValue];
    }

    return targetDimensions;
  }
}
