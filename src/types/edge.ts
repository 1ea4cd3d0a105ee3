/**
 * Rhetorical roles a citing paper can take toward the paper it cites.
 *
 *   SUPPORT    agrees with, confirms or builds positively on the cited work
 *   DISPUTE    challenges or contradicts it
 *   BACKGROUND context, related work, neutral mention
 *   METHOD     uses or adapts its methods, data or tools
 */
export enum EdgeRole {
    SUPPORT = 'SUPPORT',
    DISPUTE = 'DISPUTE',
    BACKGROUND = 'BACKGROUND',
    METHOD = 'METHOD',
}

export const EDGE_ROLES: ReadonlySet<string> = new Set<string>(Object.values(EdgeRole));

export function isEdgeRole(value: string): value is EdgeRole {
    return EDGE_ROLES.has(value);
}

/**
 * Directed citation: `citing_id` cites `cited_id` (both OpenAlex work ids).
 * Used for raw and collection-scoped edges alike.
 */
export interface CitationEdge {
    citing_id: string;
    cited_id: string;
}

/**
 * Classification result for one ordered pair.
 */
export interface EdgeRoleResult {
    role: EdgeRole;
    /** 0.0 to 1.0 */
    confidence: number;
    reason: string;
}

export interface EdgeRoleAnnotation extends CitationEdge, EdgeRoleResult {}

/** Key used for ordered-pair lookups. */
export function edgeKey(citingId: string, citedId: string): string {
    return `${citingId}->${citedId}`;
}
