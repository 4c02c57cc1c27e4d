/** Id of the transient item shown while something is dragged over the grid */
export const PLACEHOLDER_ID = '__placeholder__';

/** Id of the virtual item standing in for a cluster during a group move */
export const CLUSTER_ID = '__cluster__';

/** Coordinate marking an item that still needs auto-placement */
export const UNPLACED = -1;

/** Minimum propagation budget for moves; scaled up to 2x the item count */
export const DEFAULT_MAX_ITERATIONS = 5000;

/** Cursor steps allowed per item during bulk placement */
export const PLACEMENT_SAFETY_LIMIT = 10_000;

/** Retry budget per item when resolving overlaps or cascading pushes */
export const COLLISION_RETRY_LIMIT = 10_000;
