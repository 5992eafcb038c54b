/**
 * Codex page tags the sync cares about.
 */

export const TAG_FOUND_IN_ARCANISTS = 'Found in Arcanists';
export const TAG_OFF_HAND_ABILITY = 'Off-hand ability';

export function hasTag(entity: { tags: readonly string[] }, tag: string): boolean {
  return entity.tags.includes(tag);
}
