import { describe, it, expect } from 'vitest';
import { item } from '../test-helpers';
import {
	canItemFit,
	findFreeAreas,
	findHorizontalFreeAreas,
	firstFreeArea,
	lastRowFreeArea,
} from './free-areas';

describe('findFreeAreas', () => {
	it('should report one full-width row for an empty layout', () => {
		expect(findFreeAreas([], 4)).toEqual([{ id: 'free_area_0', x: 0, y: 0, w: 4, h: 1 }]);
	});

	it('should find the space beside an item', () => {
		expect(findFreeAreas([item('a', 0, 0, 2, 1)], 4)).toEqual([{ id: 'free_area_0', x: 2, y: 0, w: 2, h: 1 }]);
	});

	it('should keep only maximal rectangles', () => {
		expect(findFreeAreas([item('a', 0, 0, 1, 2)], 3)).toEqual([{ id: 'free_area_0', x: 1, y: 0, w: 2, h: 2 }]);
	});

	it('should report overlapping maximal rectangles separately', () => {
		const layout = [item('a', 0, 0, 1, 2), item('b', 2, 1, 1, 1)];

		expect(findFreeAreas(layout, 3)).toEqual([
			{ id: 'free_area_0', x: 1, y: 0, w: 2, h: 1 },
			{ id: 'free_area_1', x: 1, y: 0, w: 1, h: 2 },
		]);
	});

	it('should return nothing for a full band', () => {
		expect(findFreeAreas([item('a', 0, 0, 3, 2)], 3)).toEqual([]);
	});
});

describe('findHorizontalFreeAreas', () => {
	it('should split free space into runs per row', () => {
		const layout = [item('a', 0, 0, 1, 2), item('b', 2, 1, 1, 1)];

		expect(findHorizontalFreeAreas(layout, 3)).toEqual([
			{ id: 'free_area_0', x: 1, y: 0, w: 2, h: 1 },
			{ id: 'free_area_1', x: 1, y: 1, w: 1, h: 1 },
		]);
	});
});

describe('Free area lookups', () => {
	it('should return the top-left area first', () => {
		const layout = [item('a', 0, 0, 1, 2), item('b', 2, 1, 1, 1)];
		expect(firstFreeArea(layout, 3)).toEqual({ id: 'free_area_0', x: 1, y: 0, w: 2, h: 1 });
	});

	it('should find the area on the last row', () => {
		const layout = [item('a', 0, 0, 3, 1), item('b', 0, 1, 1, 1)];
		expect(lastRowFreeArea(layout, 3)).toEqual({ id: 'free_area_0', x: 1, y: 1, w: 2, h: 1 });
		expect(lastRowFreeArea([], 3)).toBeUndefined();
	});

	it('should tell whether an item fits', () => {
		const layout = [item('a', 0, 0, 2, 2), item('b', 2, 0, 1, 1)];

		expect(canItemFit(layout, 3, { w: 1, h: 1 })).toBe(true);
		expect(canItemFit(layout, 3, { w: 2, h: 1 })).toBe(false);
	});
});
