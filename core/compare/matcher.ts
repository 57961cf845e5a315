import { Entity, isTextLike, typeLabel } from '../../types/entities';
import { MatchedPair, MatchResult } from '../../types/compare';
import { CompareConfig } from './config';
import { EntitySignature, buildSignature, fingerprintsEqual } from './signature';
import { distance } from './values';

type MatcherOptions = Pick<CompareConfig, 'matchRadius' | 'keyRoundingDecimals' | 'excludedAttributes'>;

interface Candidate {
  entity: Entity;
  signature: EntitySignature;
  claimed: boolean;
}

function hasText(entity: Entity): boolean {
  return isTextLike(entity) && entity.properties.text.length > 0;
}

/**
 * Key → candidates of revision B, in input order
 */
function indexByKey(candidates: Candidate[]): Map<string, Candidate[]> {
  const index = new Map<string, Candidate[]>();
  for (const candidate of candidates) {
    const bucket = index.get(candidate.signature.key);
    if (bucket) {
      bucket.push(candidate);
    } else {
      index.set(candidate.signature.key, [candidate]);
    }
  }
  return index;
}

/**
 * Exact-key tier. Among unclaimed candidates sharing the key, the first with an
 * equal fingerprint wins, otherwise the first one.
 */
function findByKey(signature: EntitySignature, index: Map<string, Candidate[]>): Candidate | undefined {
  const open = (index.get(signature.key) ?? []).filter(candidate => !candidate.claimed);
  return open.find(candidate => fingerprintsEqual(candidate.signature.fingerprint, signature.fingerprint)) ?? open[0];
}

/**
 * Nearest-neighbor tier over same type and layer, strictly inside the radius.
 * Claimed candidates stay in the search: when the nearest one is already taken
 * the caller treats the entity as removed. Equal distances keep the first seen.
 */
function findNearest(entity: Entity, candidates: Candidate[], radius: number): Candidate | undefined {
  const label = typeLabel(entity);
  const textLike = isTextLike(entity);
  let best: Candidate | undefined;
  let bestDistance = Infinity;

  for (const candidate of candidates) {
    const other = candidate.entity;
    if (typeLabel(other) !== label || other.layer !== entity.layer) continue;
    if (textLike && !(hasText(entity) && hasText(other))) continue;

    const d = distance(entity.position, other.position);
    if (d < radius && d < bestDistance) {
      best = candidate;
      bestDistance = d;
    }
  }

  return best;
}

/**
 * Greedy two-tier pairing of revision A against revision B. Every B entity is
 * claimed at most once, in the order A is processed.
 */
export function matchEntities(entitiesA: readonly Entity[], entitiesB: readonly Entity[], options: MatcherOptions): MatchResult {
  const candidates: Candidate[] = entitiesB.map(entity => ({
    entity,
    signature: buildSignature(entity, options),
    claimed: false
  }));
  const index = indexByKey(candidates);

  const pairs: MatchedPair[] = [];
  const unmatchedA: Entity[] = [];

  for (const entity of entitiesA) {
    const signature = buildSignature(entity, options);

    const exact = findByKey(signature, index);
    if (exact) {
      exact.claimed = true;
      pairs.push({ a: entity, b: exact.entity, tier: 'exact-key' });
      continue;
    }

    const nearest = findNearest(entity, candidates, options.matchRadius);
    if (nearest && !nearest.claimed) {
      nearest.claimed = true;
      pairs.push({ a: entity, b: nearest.entity, tier: 'nearest-neighbor' });
      continue;
    }

    unmatchedA.push(entity);
  }

  return {
    pairs,
    unmatchedA,
    unmatchedB: candidates.filter(candidate => !candidate.claimed).map(candidate => candidate.entity)
  };
}
