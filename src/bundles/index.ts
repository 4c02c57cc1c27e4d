// Engine facade
export { createLayoutEngine, type LayoutEngine, type LayoutEngineConfig } from '../engine';
export type * from '../types';
export {
	CLUSTER_ID,
	COLLISION_RETRY_LIMIT,
	DEFAULT_MAX_ITERATIONS,
	PLACEHOLDER_ID,
	PLACEMENT_SAFETY_LIMIT,
	UNPLACED,
} from '../constants';

// Items and geometry
export {
	createLayoutItem,
	isUnplaced,
	layoutItemFromRecord,
	layoutItemToRecord,
	updateItem,
} from '../layout-item';
export {
	allCollisions,
	bottom,
	boundingBox,
	collides,
	compareByAxis,
	findOverlaps,
	firstCollision,
	getItem,
	sortLayoutItems,
	statics,
} from '../geometry';

// Compaction strategies
export {
	compact,
	createNoCompactor,
	fastHorizontalCompactor,
	fastVerticalCompactor,
	getCompactor,
	horizontalCompactor,
	noCompactor,
	verticalCompactor,
} from '../algorithms/compactor';

// Interaction resolvers
export { moveElement } from '../algorithms/move-element';
export { resizeItem } from '../algorithms/resize-item';
export { calculateBoundingBox, moveCluster } from '../algorithms/cluster';

// Bulk placement and layout lifecycle
export { correctBounds, optimizeLayout, placeNewItems } from '../algorithms/place-items';
export { addItems, changeColumns, reconcileLayouts, removeItem } from '../algorithms/lifecycle';
export { commitPlaceholder, removePlaceholder, showPlaceholder } from '../algorithms/placeholder';
export {
	canItemFit,
	findFreeAreas,
	findHorizontalFreeAreas,
	firstFreeArea,
	lastRowFreeArea,
	type FreeArea,
} from '../algorithms/free-areas';
