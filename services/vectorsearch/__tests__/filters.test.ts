import { allOf, escapeQueryValue, numericFilter, tagFilter, textFilter } from '../src/filters';
import { RequestValidationError } from '@cookbook/shared';

describe('search filters', () => {
    it('should escape query punctuation and spaces', () => {
        expect(escapeQueryValue('sci-fi & more')).toBe('sci\\-fi\\ \\&\\ more');
        expect(escapeQueryValue('plain')).toBe('plain');
    });

    it('should build a phrase filter', () => {
        expect(textFilter('title', 'Jurassic "Park"')).toBe('@title:"Jurassic \\"Park\\""');
    });

    it('should build a tag filter matching any value', () => {
        expect(tagFilter('genre', ['sci-fi', 'drama'])).toBe('@genre:{sci\\-fi | drama}');
    });

    it('should build open and closed numeric ranges', () => {
        expect(numericFilter('year', 1990, 2000)).toBe('@year:[1990 2000]');
        expect(numericFilter('year', 1990)).toBe('@year:[1990 +inf]');
        expect(numericFilter('year', undefined, 2000)).toBe('@year:[-inf 2000]');
    });

    it('should combine predicates', () => {
        expect(allOf(tagFilter('genre', ['drama']), numericFilter('year', 2001))).toBe('@genre:{drama} @year:[2001 +inf]');
    });

    it('should reject invalid input', () => {
        expect(() => textFilter('ti tle', 'x')).toThrow(RequestValidationError);
        expect(() => textFilter('title', '  ')).toThrow('Text filter on title needs a phrase');
        expect(() => tagFilter('genre', [])).toThrow('Tag filter on genre needs at least one value');
        expect(() => numericFilter('year', 2001, 1990)).toThrow('Numeric filter on year has min 2001 above max 1990');
    });
});
