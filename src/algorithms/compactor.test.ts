import { describe, it, expect } from 'vitest';
import { findOverlaps } from '../geometry';
import { at, formatGrid, item, pos, randomInt, randomValidLayout, staticItem } from '../test-helpers';
import type { CompactType, Layout } from '../types';
import {
	compact,
	createNoCompactor,
	fastHorizontalCompactor,
	fastVerticalCompactor,
	getCompactor,
	horizontalCompactor,
	noCompactor,
	verticalCompactor,
} from './compactor';

// ============================================================================
// Vertical
// ============================================================================

describe('verticalCompactor', () => {
	it('should pull items up into gaps', () => {
		const result = verticalCompactor.compact([item('a', 0, 0, 2, 1), item('b', 0, 5, 2, 1)], 12);
		expect(pos(result, 'b')).toEqual([0, 1]);
	});

	it('should stop items below statics', () => {
		const result = verticalCompactor.compact([staticItem('s', 0, 0, 2, 2), item('a', 0, 5, 2, 1)], 12);
		expect(pos(result, 's')).toEqual([0, 0]);
		expect(pos(result, 'a')).toEqual([0, 2]);
	});

	it('should push overlapping items below each other', () => {
		const result = verticalCompactor.compact([item('a', 0, 0, 2, 2), item('b', 1, 1, 2, 1)], 12);
		expect(pos(result, 'b')).toEqual([1, 2]);
	});

	it('should clamp negative coordinates', () => {
		const result = verticalCompactor.compact([item('a', -1, -2, 1, 1)], 12);
		expect(pos(result, 'a')).toEqual([0, 0]);
	});

	it('should keep input order and the identity of untouched items', () => {
		const a = item('a', 0, 0, 1, 1);
		const b = item('b', 0, 3, 1, 1);
		const result = verticalCompactor.compact([b, a], 12);

		expect(result.map((it) => it.id)).toEqual(['b', 'a']);
		expect(result[1]).toBe(a);
		expect(result[0]).not.toBe(b);
	});

	it('should clear moved flags', () => {
		const result = verticalCompactor.compact([item('a', 0, 0, 1, 1, { moved: true })], 12);
		expect(at(result, 'a').moved).toBe(false);
	});

	it('should return the layout as-is when overlap is allowed', () => {
		const layout = [item('a', 0, 0, 2, 2), item('b', 0, 0, 2, 2)];
		const result = verticalCompactor.compact(layout, 12, { allowOverlap: true });

		expect(result).not.toBe(layout);
		expect(result).toEqual(layout);
	});
});

// ============================================================================
// Horizontal
// ============================================================================

describe('horizontalCompactor', () => {
	it('should pull items left', () => {
		const result = horizontalCompactor.compact([item('a', 0, 0, 2, 1), item('b', 5, 0, 2, 1)], 10);
		expect(pos(result, 'b')).toEqual([2, 0]);
	});

	it('should wrap to the next row when pushed past the right edge', () => {
		const result = horizontalCompactor.compact([item('blocker', 0, 0, 9, 1), item('moving', 9, 0, 2, 1)], 10);
		expect(pos(result, 'moving')).toEqual([0, 1]);
	});
});

// ============================================================================
// No compaction
// ============================================================================

describe('noCompactor', () => {
	const layout = [item('a', 0, 0, 2, 2), item('b', 0, 1, 2, 1), item('c', 4, 5, 1, 1)];

	it('should resolve overlaps without pulling anything up', () => {
		const result = noCompactor.compact(layout, 12);

		expect(pos(result, 'b')).toEqual([0, 2]);
		expect(at(result, 'b').moved).toBe(false);
		expect(result[2]).toBe(layout[2]);
	});

	it('should mark items pushed by resolveCollisions as moved', () => {
		const result = noCompactor.resolveCollisions(layout, 12);

		expect(at(result, 'b').moved).toBe(true);
		expect(result[0]).toBe(layout[0]);
	});

	it('should push along the x axis when created for it', () => {
		const result = createNoCompactor('x').compact([item('a', 0, 0, 2, 1), item('b', 1, 0, 2, 1)], 12);
		expect(pos(result, 'b')).toEqual([2, 0]);
	});
});

// ============================================================================
// Rising tide
// ============================================================================

describe('fastVerticalCompactor', () => {
	it('should land items on the tide left by a static', () => {
		const result = fastVerticalCompactor.compact([staticItem('s', 0, 0, 12, 2), item('a', 0, 5, 4, 2)], 12);
		expect(pos(result, 'a')).toEqual([0, 2]);
	});

	it('should stack items in the same columns', () => {
		const result = fastVerticalCompactor.compact(
			[item('a', 0, 0, 2, 1), staticItem('s', 0, 1, 2, 2), item('b', 0, 4, 2, 1)],
			12,
		);
		expect(pos(result, 'a')).toEqual([0, 0]);
		expect(pos(result, 'b')).toEqual([0, 3]);
	});

	it('should not land an item on top of a static further down', () => {
		const result = fastVerticalCompactor.compact([item('a', 0, 0, 2, 2), staticItem('s', 0, 1, 2, 1)], 12);
		expect(pos(result, 'a')).toEqual([0, 2]);
	});
});

describe('fastHorizontalCompactor', () => {
	it('should land items right of a static', () => {
		const result = fastHorizontalCompactor.compact([staticItem('s', 2, 0, 2, 1), item('a', 5, 0, 1, 1)], 12);
		expect(pos(result, 'a')).toEqual([4, 0]);
	});

	it('should shift an item past a static it would cover', () => {
		const result = fastHorizontalCompactor.compact([item('d', 0, 0, 5, 2), staticItem('s', 2, 0, 2, 2)], 12);
		expect(pos(result, 'd')).toEqual([4, 0]);
	});

	it('should take the row lanes from the items, whatever the column count', () => {
		const layout = [item('a', 3, 0, 1, 1), item('b', 2, 4, 1, 2)];
		const narrow = fastHorizontalCompactor.compact(layout, 1);
		const wide = fastHorizontalCompactor.compact(layout, 12);

		expect(pos(narrow, 'a')).toEqual([0, 0]);
		expect(pos(narrow, 'b')).toEqual([0, 4]);
		expect(narrow).toEqual(wide);
	});

	it('should wrap overlapping items at the column count before compacting', () => {
		const result = fastHorizontalCompactor.compact([item('a', 0, 0, 2, 1), item('b', 0, 0, 2, 1)], 2);

		expect(pos(result, 'a')).toEqual([0, 0]);
		expect(pos(result, 'b')).toEqual([0, 1]);
		expect(at(result, 'b').moved).toBe(false);
	});

	it('should wrap overlaps at the column count like the horizontal strategy', () => {
		const result = fastHorizontalCompactor.resolveCollisions([item('a', 0, 0, 3, 1), item('b', 1, 0, 2, 1)], 4);
		expect(pos(result, 'b')).toEqual([0, 1]);
	});
});

// ============================================================================
// Registry
// ============================================================================

describe('getCompactor', () => {
	it('should map every compact type to its strategy', () => {
		expect(getCompactor('vertical')).toBe(verticalCompactor);
		expect(getCompactor('horizontal')).toBe(horizontalCompactor);
		expect(getCompactor('none')).toBe(noCompactor);
		expect(getCompactor('fast-vertical')).toBe(fastVerticalCompactor);
		expect(getCompactor('fast-horizontal')).toBe(fastHorizontalCompactor);
	});

	it('should compact through the named strategy', () => {
		const result = compact([item('a', 0, 3, 1, 1)], 'vertical', 12);
		expect(pos(result, 'a')).toEqual([0, 0]);
	});
});

// ============================================================================
// Property-based tests
// ============================================================================

const ALL_TYPES: CompactType[] = ['vertical', 'horizontal', 'none', 'fast-vertical', 'fast-horizontal'];

function reportOverlaps(label: string, layout: Layout, result: Layout, columns: number) {
	const overlaps = findOverlaps(result);
	if (overlaps.length > 0) {
		console.log(`\n=== OVERLAP DETECTED (${label}) ===`);
		console.log('Initial:');
		console.log(formatGrid(layout, columns));
		console.log('Result:');
		console.log(formatGrid(result, columns));
		console.log('Overlapping pairs:', overlaps.map(([a, b]) => `${a.id} <-> ${b.id}`));
	}
	return overlaps;
}

describe('PROPERTY: compaction never produces overlaps', () => {
	for (const type of ALL_TYPES) {
		it(`${type}`, () => {
			for (let i = 0; i < 50; i++) {
				const columns = randomInt(4, 8);
				const layout = randomValidLayout(randomInt(2, 12), columns, { staticChance: 0.2 });
				const result = compact(layout, type, columns);

				expect(reportOverlaps(type, layout, result, columns)).toHaveLength(0);
				expect(result.map((it) => it.id)).toEqual(layout.map((it) => it.id));
			}
		});
	}
});

describe('PROPERTY: statics never move', () => {
	for (const type of ALL_TYPES) {
		it(`${type}`, () => {
			for (let i = 0; i < 50; i++) {
				const layout = randomValidLayout(randomInt(2, 10), 6, { staticChance: 0.3 });
				const result = compact(layout, type, 6);

				for (const original of layout.filter((it) => it.isStatic)) {
					expect(pos(result, original.id)).toEqual([original.x, original.y]);
				}
			}
		});
	}
});

describe('PROPERTY: compaction is idempotent', () => {
	const BASELINE_TYPES: CompactType[] = ['vertical', 'horizontal', 'none'];

	for (const type of BASELINE_TYPES) {
		it(`${type}`, () => {
			for (let i = 0; i < 50; i++) {
				const layout = randomValidLayout(randomInt(2, 12), 6, { staticChance: 0.2 });
				const once = compact(layout, type, 6);
				const twice = compact(once, type, 6);

				expect(twice.map((it) => [it.x, it.y])).toEqual(once.map((it) => [it.x, it.y]));
			}
		});
	}
});
