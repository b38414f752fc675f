/**
 * Visibility levels used to filter bulk scans.
 *
 * @module reflect/visibility
 */

import type { MemberDescriptor, Modifier } from './types.js';

/**
 * Minimal visibility a member must have to be included in a scan.
 *
 * - `PACKAGE`: everything except `private` (includes `@internal` members)
 * - `PROTECTED`: `public` and `protected`
 * - `PUBLIC`: `public` only
 */
export type Visibility = 'PACKAGE' | 'PROTECTED' | 'PUBLIC';

/**
 * All visibility levels, broadest first.
 */
export const VISIBILITY_LEVELS: readonly Visibility[] = ['PACKAGE', 'PROTECTED', 'PUBLIC'] as const;

const VISIBILITY_PREDICATES: Readonly<
  Record<Visibility, (modifiers: ReadonlySet<Modifier>) => boolean>
> = {
  PACKAGE: (modifiers) => !modifiers.has('private'),
  PROTECTED: (modifiers) => modifiers.has('public') || modifiers.has('protected'),
  PUBLIC: (modifiers) => modifiers.has('public'),
};

/**
 * Returns whether a member with these modifiers is included at `level`.
 *
 * @param modifiers - Declared modifiers of the member.
 * @param level - Minimal visibility of the scan.
 */
export function isVisible(modifiers: ReadonlySet<Modifier>, level: Visibility): boolean {
  return VISIBILITY_PREDICATES[level](modifiers);
}

/**
 * Returns whether `member` is included at `level`.
 */
export function isMemberVisible(member: MemberDescriptor, level: Visibility): boolean {
  return isVisible(member.modifiers, level);
}
