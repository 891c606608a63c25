/**
 * access-engine - Resource Patterns
 *
 * Path-segment matching for permission resources.
 *
 * Pattern format: segment/segment/...
 * Examples:
 *   - invoices/123   - exactly that invoice
 *   - invoices/*     - any single invoice
 *   - tenants/**     - everything below tenants, including tenants itself
 *   - **             - every resource
 */

export const SEGMENT_SEPARATOR = '/';
export const SINGLE_WILDCARD = '*';
export const TRAILING_WILDCARD = '**';

/**
 * Split a path into segments. The empty path has no segments.
 *
 * @example
 * splitSegments('orders/42') // ['orders', '42']
 * splitSegments('')          // []
 */
export function splitSegments(path: string): string[] {
  return path === '' ? [] : path.split(SEGMENT_SEPARATOR);
}

/**
 * A pattern is well formed when `**` appears at most once, as the last segment
 *
 * @example
 * isValidResourcePattern('orders/**')   // true
 * isValidResourcePattern('orders/**\/x') // false
 */
export function isValidResourcePattern(pattern: string): boolean {
  const segments = splitSegments(pattern);
  const index = segments.indexOf(TRAILING_WILDCARD);
  return index === -1 || index === segments.length - 1;
}

/**
 * Check if a resource pattern matches a concrete resource
 *
 * @param pattern - The pattern from the permission
 * @param resource - The resource being requested
 * @returns true if the pattern covers the resource
 *
 * @example
 * matchResource('orders/*', 'orders/42')        // true
 * matchResource('orders/*', 'orders/42/items')  // false
 * matchResource('orders/**', 'orders/42/items') // true
 * matchResource('orders/**', 'orders')          // true
 */
export function matchResource(pattern: string, resource: string): boolean {
  if (!isValidResourcePattern(pattern)) {
    return false;
  }

  const patternSegments = splitSegments(pattern);
  const resourceSegments = splitSegments(resource);
  const last = patternSegments.length - 1;
  const trailing = last >= 0 && patternSegments[last] === TRAILING_WILDCARD;
  const fixed = trailing ? patternSegments.slice(0, last) : patternSegments;

  if (trailing ? resourceSegments.length < fixed.length : resourceSegments.length !== fixed.length) {
    return false;
  }

  return fixed.every(
    (segment, i) => segment === SINGLE_WILDCARD || segment === resourceSegments[i]
  );
}

/**
 * Check if a permission action covers the requested action. Never case-folded.
 */
export function matchAction(permissionAction: string, action: string): boolean {
  return permissionAction === SINGLE_WILDCARD || permissionAction === action;
}
