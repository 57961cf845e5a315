import { Entity, Point3, PropertyValue } from './entities';
import { ReportedIssue } from '../core/errors/types';

export type MatchTier = 'exact-key' | 'nearest-neighbor';

export interface MatchedPair {
  a: Entity;
  b: Entity;
  tier: MatchTier;
}

export interface MatchResult {
  pairs: MatchedPair[];
  /** Entities of revision A with no counterpart */
  unmatchedA: Entity[];
  /** Entities of revision B never claimed */
  unmatchedB: Entity[];
}

/**
 * One attribute difference. `null` marks the side an attribute is missing from.
 */
export interface AttributeChange {
  attribute: string;
  oldValue: PropertyValue | null;
  newValue: PropertyValue | null;
}

export interface ModifiedEntity {
  entityType: string;
  layer: string;
  position: Point3;
  entityIds: readonly [string, string];
  matchTier: MatchTier;
  changes: AttributeChange[];
}

export type ChangeRecord =
  | { kind: 'added'; entity: Entity }
  | { kind: 'removed'; entity: Entity }
  | { kind: 'modified'; a: Entity; b: Entity; tier: MatchTier; changes: AttributeChange[] };

export interface ComparisonResult {
  added: Entity[];
  removed: Entity[];
  modified: ModifiedEntity[];
  /** Matched pairs with no reportable difference */
  unchanged: number;
  totalEntitiesA: number;
  totalEntitiesB: number;
}

export type WarningSide = 'a' | 'b';

export interface SideWarning extends ReportedIssue {
  side: WarningSide;
}

/**
 * File-level comparison: the entity diff plus extraction warnings for both sides
 */
export interface DrawingComparison extends ComparisonResult {
  fileA: string;
  fileB: string;
  warnings: SideWarning[];
}

export type ComparisonOutcome = 'identical' | 'different' | 'failed';
