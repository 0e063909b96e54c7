/**
 * @campus-events/shared -- Prefixed ULID generation.
 *
 * Entity IDs are prefixed ULIDs, e.g. "evt_01HXYZ...".
 */

import { monotonicFactory } from "ulid";
import { ID_PREFIXES } from "./constants";

// Within the same millisecond the random component is incremented, so
// successive IDs still sort lexicographically.
const monotonic = monotonicFactory();

export type EntityType = keyof typeof ID_PREFIXES;

/** New prefixed ULID for the given entity type (e.g. "event", "rsvp"). */
export function generateId(entity: EntityType): string {
  return ID_PREFIXES[entity] + monotonic();
}
