export const POLICY_ID_GENERATOR = 'PolicyIdGenerator';

/**
 * Produces record identifiers. Must be collision-resistant (random,
 * not sequential).
 */
export type PolicyIdGenerator = () => string;
