import { clampPageSize, paginate } from './page';

describe('paginate', () => {
    const items = ['a', 'b', 'c', 'd', 'e'];

    it('should slice the requested page', () => {
        expect(paginate(items, 1, 2)).toEqual({
            content: ['c', 'd'],
            page: 1,
            size: 2,
            totalElements: 5,
            totalPages: 3,
            first: false,
            last: false,
        });
    });

    it('should mark the final page as last', () => {
        expect(paginate(items, 2, 2)).toMatchObject({ content: ['e'], last: true });
    });

    it('should return an empty page past the end', () => {
        expect(paginate(items, 5, 2)).toMatchObject({ content: [], first: false, last: true });
    });

    it('should treat an empty list as a single first and last page', () => {
        expect(paginate([], 0, 10)).toEqual({
            content: [],
            page: 0,
            size: 10,
            totalElements: 0,
            totalPages: 0,
            first: true,
            last: true,
        });
    });
});

describe('clampPageSize', () => {
    it('should default and cap the size', () => {
        expect(clampPageSize(undefined)).toBe(10);
        expect(clampPageSize(25)).toBe(25);
        expect(clampPageSize(1000)).toBe(100);
    });
});
