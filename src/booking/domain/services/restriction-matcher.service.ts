import { Injectable } from '@nestjs/common';

/**
 * Count-based coverage rule: a restaurant qualifies when it holds at least as
 * many of the required endorsements as there are required endorsements.
 * Holding none never qualifies, so restrictions that map to no endorsement
 * exclude every restaurant.
 */
export function coversRequiredEndorsements(
  heldEndorsementIds: Iterable<string>,
  requiredEndorsementIds: ReadonlySet<string>,
): boolean {
  const matching = new Set<string>();
  for (const id of heldEndorsementIds) {
    if (requiredEndorsementIds.has(id)) {
      matching.add(id);
    }
  }
  return matching.size > 0 && matching.size >= requiredEndorsementIds.size;
}

@Injectable()
export class RestrictionMatcherService {
  /**
   * Union of dietary restriction ids across the named party members.
   * Unnamed guests carry no restrictions and are not passed in.
   */
  aggregateRestrictions(
    restrictionsByEater: Array<{ eaterId: string; restrictionId: string }>,
  ): string[] {
    return [...new Set(restrictionsByEater.map((r) => r.restrictionId))];
  }

  /**
   * Every endorsement that satisfies at least one of the requested restrictions.
   */
  requiredEndorsements(
    restrictionIds: string[],
    coverage: Array<{ restrictionId: string; endorsementId: string }>,
  ): Set<string> {
    const requested = new Set(restrictionIds);
    return new Set(
      coverage
        .filter((mapping) => requested.has(mapping.restrictionId))
        .map((mapping) => mapping.endorsementId),
    );
  }

  /**
   * Keeps the restaurants whose endorsements cover the requested restrictions.
   * Input order is preserved.
   */
  filter<T extends { id: string }>(
    restaurants: T[],
    restrictionIds: string[],
    requiredEndorsementIds: ReadonlySet<string>,
    restaurantEndorsements: Array<{
      restaurantId: string;
      endorsementId: string;
    }>,
  ): T[] {
    if (restrictionIds.length === 0) {
      return restaurants;
    }

    const heldByRestaurant = new Map<string, string[]>();
    for (const { restaurantId, endorsementId } of restaurantEndorsements) {
      const held = heldByRestaurant.get(restaurantId) ?? [];
      held.push(endorsementId);
      heldByRestaurant.set(restaurantId, held);
    }

    return restaurants.filter((restaurant) =>
      coversRequiredEndorsements(
        heldByRestaurant.get(restaurant.id) ?? [],
        requiredEndorsementIds,
      ),
    );
  }
}
