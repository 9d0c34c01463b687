import { INodeProperties } from './interfaces';
import { Checkpoint } from '../types';
import { pushCheckpoint, upperLookup } from '../checkpoints';
import { ErrorCodes, LedgerError } from '../errors';

export const MAX_NODE_QUALITY = 10;

export interface NodePropertiesSnapshot {
  attached: number[];
  quality: Array<[number, Checkpoint<number>[]]>;
}

/**
 * In-process node registry: which positions are attached to a node and the
 * node's quality score over time.
 */
export class InMemoryNodeProperties implements INodeProperties {
  private attached = new Set<number>();
  private quality = new Map<number, Checkpoint<number>[]>();

  isAttached(positionId: number): boolean {
    return this.attached.has(positionId);
  }

  setAttached(positionId: number, attached: boolean): void {
    if (attached) {
      this.attached.add(positionId);
    } else {
      this.attached.delete(positionId);
    }
  }

  /** Record the quality score in effect from `timestamp` onwards */
  setNodeQuality(positionId: number, quality: number, timestamp: number): void {
    if (!Number.isInteger(quality) || quality < 0 || quality > MAX_NODE_QUALITY) {
      throw new LedgerError(
        ErrorCodes.INVALID_QUALITY,
        `Node quality must be an integer in 0..${MAX_NODE_QUALITY}: ${quality}`,
        { quality }
      );
    }
    const series = this.quality.get(positionId) ?? [];
    pushCheckpoint(series, timestamp, quality, 'replace');
    this.quality.set(positionId, series);
  }

  nodeQualityOf(positionId: number, timestamp: number): number {
    const series = this.quality.get(positionId);
    return series ? upperLookup(series, timestamp) ?? 0 : 0;
  }

  snapshot(): NodePropertiesSnapshot {
    return structuredClone({
      attached: Array.from(this.attached),
      quality: Array.from(this.quality.entries()),
    });
  }

  restore(snapshot: NodePropertiesSnapshot): void {
    const copy = structuredClone(snapshot);
    this.attached = new Set(copy.attached);
    this.quality = new Map(copy.quality);
  }
}
