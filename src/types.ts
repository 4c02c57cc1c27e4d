// ============================================================================
// Layout Items
// ============================================================================

/**
 * A single item on the grid. Positions and spans are in grid cells.
 *
 * Items are values: every engine function returns new objects instead of
 * changing the ones it was given.
 */
export interface LayoutItem {
	readonly id: string;
	/** Cross-axis index (column). -1 means "needs auto-placement". */
	readonly x: number;
	/** Main-axis index (row). -1 means "needs auto-placement". */
	readonly y: number;
	readonly w: number;
	readonly h: number;
	readonly minW: number;
	readonly minH: number;
	readonly maxW: number;
	readonly maxH: number;
	/** Static items are never moved and always act as obstacles */
	readonly isStatic: boolean;
	readonly isDraggable?: boolean;
	/** When false the resize resolver leaves the item alone */
	readonly isResizable?: boolean;
	/** Set when the current call changed the item's position (animation hint) */
	readonly moved: boolean;
}

export type Layout = readonly LayoutItem[];

/**
 * Fields accepted by createLayoutItem. Everything but the geometry has a default.
 */
export interface LayoutItemInit {
	id: string;
	x: number;
	y: number;
	w: number;
	h: number;
	minW?: number;
	minH?: number;
	maxW?: number;
	maxH?: number;
	isStatic?: boolean;
	isDraggable?: boolean;
	isResizable?: boolean;
	moved?: boolean;
}

/**
 * JSON-safe form of a LayoutItem. Infinite max sizes are stored as null.
 */
export interface LayoutItemRecord {
	id: string;
	x: number;
	y: number;
	w: number;
	h: number;
	minW: number;
	minH: number;
	maxW: number | null;
	maxH: number | null;
	isDraggable: boolean | null;
	isResizable: boolean | null;
	isStatic: boolean;
	moved: boolean;
}

export interface GridRect {
	x: number;
	y: number;
	w: number;
	h: number;
}

// ============================================================================
// Strategies
// ============================================================================

export type Axis = 'x' | 'y';

export type CompactType =
	| 'vertical'
	| 'horizontal'
	| 'none'
	| 'fast-vertical'
	| 'fast-horizontal';

export type ResizeBehavior = 'push' | 'shrink';

export interface CompactOptions {
	/** When true the layout is returned as-is (default: false) */
	allowOverlap?: boolean;
}

/**
 * Common contract of the compaction strategies
 */
export interface Compactor {
	readonly type: CompactType;
	/** Axis along which resolveCollisions pushes items */
	readonly axis: Axis;
	/**
	 * Move items toward the origin (where the strategy has gravity) and
	 * resolve overlaps. Clears the `moved` flag.
	 */
	compact(layout: Layout, columns: number, options?: CompactOptions): LayoutItem[];
	/**
	 * Resolve overlaps only, pushing later items forward along `axis`.
	 * Pushed items are marked `moved`.
	 */
	resolveCollisions(layout: Layout, columns: number): LayoutItem[];
}

// ============================================================================
// Operation Options
// ============================================================================

export interface IterationLimitOptions {
	/** Lower bound of the propagation safety cap (default: DEFAULT_MAX_ITERATIONS) */
	maxIterations?: number;
}

export interface MoveElementOptions extends IterationLimitOptions {
	columns: number;
	/** Strategy used for the final overlap pass (default: 'vertical') */
	compactType?: CompactType;
	/** Run an overlap resolution pass on the result (default: false) */
	preventCollision?: boolean;
	/** Recompute even when the item is already at the target (default: false) */
	force?: boolean;
}

export interface ResizeItemOptions extends IterationLimitOptions {
	behavior: ResizeBehavior;
	columns: number;
	/** Reject resizes that would displace the item past a static one (default: false) */
	preventCollision?: boolean;
}

export interface MoveClusterOptions extends IterationLimitOptions {
	columns: number;
	compactType?: CompactType;
	preventCollision?: boolean;
}

export interface PlaceNewItemsOptions {
	/** Attempts per item before falling back to the bottom row (default: PLACEMENT_SAFETY_LIMIT) */
	safetyLimit?: number;
}

export interface LayoutChangeOptions {
	columns: number;
	compactType: CompactType;
}
