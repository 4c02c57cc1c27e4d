import type {
	CompactType,
	Compactor,
	GridRect,
	Layout,
	LayoutItem,
	ResizeBehavior,
} from './types';
import { getItem } from './geometry';
import { getCompactor } from './algorithms/compactor';
import { moveElement } from './algorithms/move-element';
import { resizeItem } from './algorithms/resize-item';
import { correctBounds, optimizeLayout, placeNewItems } from './algorithms/place-items';
import { moveCluster } from './algorithms/cluster';
import { addItems, changeColumns, removeItem } from './algorithms/lifecycle';
import { commitPlaceholder, showPlaceholder } from './algorithms/placeholder';

export interface LayoutEngineConfig {
	/** Number of grid columns, whatever the compaction strategy; a positive integer */
	columns: number;
	/** Compaction strategy (default: 'vertical') */
	compactType?: CompactType;
	/** Behavior when a resize runs into neighbors (default: 'push') */
	resizeBehavior?: ResizeBehavior;
	/** Guarantee collision-free results after moves and resizes (default: true) */
	preventCollision?: boolean;
	/** Lower bound of the move propagation safety cap */
	maxIterations?: number;
}

/**
 * Engine bound to one grid configuration. Every method is pure: it returns a
 * new layout (or the input on no-op and rollback paths).
 */
export interface LayoutEngine {
	readonly columns: number;
	readonly compactType: CompactType;
	readonly resizeBehavior: ResizeBehavior;
	readonly preventCollision: boolean;
	readonly compactor: Compactor;

	compact(layout: Layout): Layout;
	/**
	 * Drag preview: move the item with `id` toward `(x, y)`, clamped to the
	 * grid, pushing whatever is in the way. No compaction.
	 */
	dragItem(layout: Layout, id: string, x: number, y: number): Layout;
	/** Drop: dragItem followed by compaction */
	moveItem(layout: Layout, id: string, x: number, y: number): Layout;
	resizeItem(layout: Layout, resized: LayoutItem): Layout;
	placeNewItems(layout: Layout, newItems: Layout): Layout;
	optimize(layout: Layout): Layout;
	correctBounds(layout: Layout): Layout;
	moveCluster(layout: Layout, ids: Iterable<string>, x: number, y: number): Layout;
	addItems(layout: Layout, items: Layout): Layout;
	removeItem(layout: Layout, id: string): Layout;
	showPlaceholder(baseLayout: Layout, rect: GridRect): Layout;
	commitPlaceholder(layout: Layout, newId: string): Layout;
	/** Layout recomputed for `columns`, and an engine configured for it */
	withColumns(layout: Layout, columns: number): { engine: LayoutEngine; layout: Layout };
}

/**
 * Create a layout engine for a grid configuration
 *
 * @throws RangeError when `columns` is not a positive integer
 */
export function createLayoutEngine(config: LayoutEngineConfig): LayoutEngine {
	const {
		columns,
		compactType = 'vertical',
		resizeBehavior = 'push',
		preventCollision = true,
		maxIterations,
	} = config;

	if (!Number.isInteger(columns) || columns < 1) {
		throw new RangeError(`[engine] columns must be a positive integer, got ${columns}`);
	}

	const compactor = getCompactor(compactType);
	const change = { columns, compactType };

	const engine: LayoutEngine = {
		columns,
		compactType,
		resizeBehavior,
		preventCollision,
		compactor,

		compact(layout) {
			return compactor.compact(layout, columns);
		},

		dragItem(layout, id, x, y) {
			const item = getItem(layout, id);
			if (!item) return layout;

			// Keep the item inside the cross axis; the main axis is unbounded
			const clampedX = Math.min(Math.max(x, 0), Math.max(columns - item.w, 0));
			const clampedY = Math.max(y, 0);

			return moveElement(layout, item, clampedX, clampedY, {
				columns,
				compactType,
				preventCollision,
				maxIterations,
			});
		},

		moveItem(layout, id, x, y) {
			const dragged = engine.dragItem(layout, id, x, y);
			if (dragged === layout) return layout;
			// 'none' still resolves overlaps here
			return compactor.compact(dragged, columns);
		},

		resizeItem(layout, resized) {
			return resizeItem(layout, resized, {
				behavior: resizeBehavior,
				columns,
				preventCollision,
				maxIterations,
			});
		},

		placeNewItems(layout, newItems) {
			return placeNewItems(layout, newItems, columns);
		},

		optimize(layout) {
			return optimizeLayout(layout, columns);
		},

		correctBounds(layout) {
			return correctBounds(layout, columns);
		},

		moveCluster(layout, ids, x, y) {
			return moveCluster(layout, ids, x, y, {
				columns,
				compactType,
				preventCollision,
				maxIterations,
			});
		},

		addItems(layout, items) {
			return addItems(layout, items, change);
		},

		removeItem(layout, id) {
			return removeItem(layout, id, change);
		},

		showPlaceholder(baseLayout, rect) {
			return showPlaceholder(baseLayout, rect, change);
		},

		commitPlaceholder(layout, newId) {
			return commitPlaceholder(layout, newId, change);
		},

		withColumns(layout, nextColumns) {
			const next = createLayoutEngine({ ...config, columns: nextColumns });
			return { engine: next, layout: changeColumns(layout, nextColumns, compactType) };
		},
	};

	return Object.freeze(engine);
}
