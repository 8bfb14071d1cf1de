import { describe, it, expect } from 'vitest';
import * as bibkeys from '../index.js';

describe('public API', () => {
    it('should normalize and key through the package entry', () => {
        const { displayAuthorsList } = bibkeys.normalizeAuthors('Gauss CF');
        const surname = bibkeys.surnameOf(displayAuthorsList[0] ?? '');

        expect(bibkeys.generateCiteKey(surname, 1801, [], null)).toBe('Gauss1801a');
    });

    it('should expose the error classes', () => {
        expect(new bibkeys.DuplicateCiteKeyError('Gauss1801a').code).toBe('DUPLICATE_CITEKEY');
        expect(new bibkeys.InvalidRecordStateError('no authors', 'authors').code).toBe('INVALID_RECORD_STATE');
    });

    it('should list export formats', () => {
        expect(bibkeys.EXPORT_FORMATS).toEqual(['bibtex', 'json', 'csv']);
    });
});
