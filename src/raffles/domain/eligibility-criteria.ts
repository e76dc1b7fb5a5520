export interface UserProfile {
  readonly userId: string;
  readonly age?: number;
  /** Region or country code, e.g. "MX-NLE". */
  readonly location?: string;
  readonly hasActiveSubscription?: boolean;
  readonly isVerified?: boolean;
}

export interface EligibilityCriteria {
  readonly minAge?: number;
  readonly maxAge?: number;
  readonly allowedLocations?: readonly string[];
  readonly excludedLocations?: readonly string[];
  readonly requiresSubscription?: boolean;
  readonly requiresVerification?: boolean;
}

export const OPEN_ELIGIBILITY: EligibilityCriteria = {};

/**
 * First criterion the profile fails, or null when the user is eligible.
 * A criterion that needs an attribute the profile does not carry fails.
 */
export function unmetCriterion(criteria: EligibilityCriteria, profile: UserProfile): string | null {
  if (criteria.minAge !== undefined && (profile.age === undefined || profile.age < criteria.minAge)) {
    return `minimum age is ${criteria.minAge}`;
  }
  if (criteria.maxAge !== undefined && (profile.age === undefined || profile.age > criteria.maxAge)) {
    return `maximum age is ${criteria.maxAge}`;
  }

  const location = profile.location?.toUpperCase();
  if (criteria.allowedLocations && criteria.allowedLocations.length > 0) {
    const allowed = criteria.allowedLocations.map((l) => l.toUpperCase());
    if (!location || !allowed.some((l) => location === l || location.startsWith(`${l}-`))) {
      return 'location is not allowed';
    }
  }
  if (location && criteria.excludedLocations) {
    const excluded = criteria.excludedLocations.map((l) => l.toUpperCase());
    if (excluded.some((l) => location === l || location.startsWith(`${l}-`))) {
      return 'location is excluded';
    }
  }

  if (criteria.requiresSubscription && !profile.hasActiveSubscription) {
    return 'an active subscription is required';
  }
  if (criteria.requiresVerification && !profile.isVerified) {
    return 'a verified identity is required';
  }
  return null;
}
