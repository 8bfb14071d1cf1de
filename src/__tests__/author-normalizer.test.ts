import { describe, it, expect } from 'vitest';
import {
    normalizeAuthors,
    simplifyName,
    surnameOf,
    joinDisplayNames,
    normalizeSeparators,
} from '../names/author-normalizer.js';

describe('normalizeAuthors', () => {
    describe('initials after the surname', () => {
        it('should turn "Gauss CF" into "C. F. Gauss"', () => {
            const result = normalizeAuthors('Gauss CF');
            expect(result.displayAuthorsList).toEqual(['C. F. Gauss']);
            expect(result.displayString).toBe('C. F. Gauss');
            expect(result.simplifiedAuthorsList).toEqual(['c. gauss']);
        });

        it('should handle a single initial', () => {
            expect(normalizeAuthors('Smith J').displayAuthorsList).toEqual(['J. Smith']);
        });

        it('should handle three initials', () => {
            expect(normalizeAuthors('Doe JRR').displayAuthorsList).toEqual(['J. R. R. Doe']);
        });

        it('should not read a roman numeral suffix as initials', () => {
            expect(normalizeAuthors('Henry Ford II').displayAuthorsList).toEqual(['H. Ford II']);
        });

        it('should not read a lowercase or long trailing word as initials', () => {
            expect(normalizeAuthors('Anna Berg abc').displayAuthorsList).toEqual(['A. B. abc']);
            expect(normalizeAuthors('Anna Berg ABCD').displayAuthorsList).toEqual(['A. B. ABCD']);
        });
    });

    describe('abbreviation', () => {
        it('should abbreviate every given name', () => {
            expect(normalizeAuthors('Carl Friedrich Gauss').displayAuthorsList).toEqual(['C. F. Gauss']);
        });

        it('should abbreviate hyphenated given names segment by segment', () => {
            const result = normalizeAuthors('Jean-Paul Sartre');
            expect(result.displayAuthorsList).toEqual(['J.-P. Sartre']);
            expect(result.simplifiedAuthorsList).toEqual(['j. sartre', 'p. sartre']);
        });

        it('should abbreviate two-letter names without a period', () => {
            expect(normalizeAuthors('Jo Smith').displayAuthorsList).toEqual(['J. Smith']);
        });

        it('should leave existing initials alone', () => {
            expect(normalizeAuthors('C. F. Gauss').displayAuthorsList).toEqual(['C. F. Gauss']);
        });

        it('should keep a leading Dr. prefix', () => {
            expect(normalizeAuthors('Dr. Carl Gauss').displayAuthorsList).toEqual(['Dr. C. Gauss']);
        });

        it('should keep prepositions after the first word', () => {
            expect(normalizeAuthors('Ludwig van Beethoven').displayAuthorsList).toEqual(['L. van Beethoven']);
            expect(normalizeAuthors('Johann von der Heide').displayAuthorsList).toEqual(['J. von der Heide']);
        });

        it('should abbreviate a preposition in first position', () => {
            expect(normalizeAuthors('van Smith').displayAuthorsList).toEqual(['v. Smith']);
        });

        it('should keep suffixes after the surname', () => {
            expect(normalizeAuthors('Martin Luther King Jr.').displayAuthorsList).toEqual(['M. L. King Jr.']);
            expect(normalizeAuthors('John Smith Jr. III').displayAuthorsList).toEqual(['J. Smith Jr. III']);
        });
    });

    describe('separators', () => {
        it('should split on commas, semicolons and "and"', () => {
            const result = normalizeAuthors('Alice Smith; Bob Jones and Carol Lee');
            expect(result.displayAuthorsList).toEqual(['A. Smith', 'B. Jones', 'C. Lee']);
        });

        it('should accept ",and" without a space', () => {
            expect(normalizeAuthors('Alice Smith,and Bob Jones').displayAuthorsList).toEqual(['A. Smith', 'B. Jones']);
        });

        it('should drop blank entries and re-index', () => {
            const result = normalizeAuthors('Alice Smith,, Bob Jones, ');
            expect(result.displayAuthorsList).toEqual(['A. Smith', 'B. Jones']);
            expect(result.bibtexString).toBe('A. Smith and B. Jones');
        });
    });

    describe('display string', () => {
        it('should use a serial comma for three or more authors', () => {
            const result = normalizeAuthors('Alice Smith, Bob Jones, Carol Lee');
            expect(result.displayString).toBe('A. Smith, B. Jones, and C. Lee');
            expect(result.bibtexString).toBe('A. Smith and B. Jones and C. Lee');
            expect(result.simplifiedAuthorsList).toEqual(['a. smith', 'b. jones', 'c. lee']);
        });

        it('should join two authors with "and"', () => {
            expect(normalizeAuthors('Alice Smith, Bob Jones').displayString).toBe('A. Smith and B. Jones');
        });
    });

    describe('diacritics', () => {
        it('should fold a single-word name', () => {
            const result = normalizeAuthors('Müller');
            expect(result.displayAuthorsList).toEqual(['Müller']);
            expect(result.simplifiedAuthorsList).toEqual(['mueller']);
        });

        it('should fold given name and surname pairs', () => {
            const result = normalizeAuthors('Hans Müller and Jürgen Groß');
            expect(result.displayAuthorsList).toEqual(['H. Müller', 'J. Groß']);
            expect(result.simplifiedAuthorsList).toEqual(['h. mueller', 'j. gross']);
            expect(result.displayString).toBe('H. Müller and J. Groß');
        });
    });

    describe('escaped literal', () => {
        it('should keep a braced name as one opaque author', () => {
            const result = normalizeAuthors('{Special Group Name}');
            expect(result).toEqual({
                escaped: true,
                displayAuthorsList: ['Special Group Name'],
                simplifiedAuthorsList: [],
                bibtexString: null,
                displayString: '{Special Group Name}',
            });
        });

        it('should detect braces around surrounding whitespace', () => {
            const result = normalizeAuthors('  {ACME Corp, and Friends}  ');
            expect(result.escaped).toBe(true);
            expect(result.displayAuthorsList).toEqual(['ACME Corp, and Friends']);
        });

        it('should parse a field that only opens with a brace', () => {
            const result = normalizeAuthors('{Alice} Smith, Bob Jones');
            expect(result.escaped).toBe(false);
            expect(result.displayAuthorsList).toEqual(['{. Smith', 'B. Jones']);
        });
    });

    describe('degenerate input', () => {
        it('should yield a single blank entry for an empty field', () => {
            expect(normalizeAuthors('')).toEqual({
                escaped: false,
                displayAuthorsList: [''],
                simplifiedAuthorsList: [],
                bibtexString: '',
                displayString: '',
            });
        });

        it('should treat separators only as empty', () => {
            expect(normalizeAuthors(' , ; ').displayAuthorsList).toEqual(['']);
        });
    });

    describe('determinism', () => {
        it('should return equal results for equal input', () => {
            const input = 'Gauss CF; Jean-Paul Sartre and Ludwig van Beethoven';
            expect(normalizeAuthors(input)).toEqual(normalizeAuthors(input));
        });

        it('should converge when fed its own display string', () => {
            for (const input of ['Alice Smith, Bob Jones, Carol Lee', 'Jean-Paul Sartre and Gauss CF', 'Dr. Carl Gauss']) {
                const once = normalizeAuthors(input);
                const twice = normalizeAuthors(once.displayString);
                expect(twice.displayString).toBe(once.displayString);
                expect(twice.displayAuthorsList).toEqual(once.displayAuthorsList);
            }
        });
    });
});

describe('simplifyName', () => {
    it('should lowercase and fold the four diacritics', () => {
        expect(simplifyName('Jürgen Groß')).toBe('juergen gross');
        expect(simplifyName('ÄRGER Öl')).toBe('aerger oel');
    });

    it('should leave other accents untouched', () => {
        expect(simplifyName('José')).toBe('josé');
    });
});

describe('surnameOf', () => {
    it('should return the last word', () => {
        expect(surnameOf('C. F. Gauss')).toBe('Gauss');
        expect(surnameOf('Gauss')).toBe('Gauss');
        expect(surnameOf('')).toBe('');
    });

    it('should ignore surrounding and repeated whitespace', () => {
        expect(surnameOf('ACME Group ')).toBe('Group');
        expect(surnameOf('C.  F.\tGauss')).toBe('Gauss');
    });
});

describe('joinDisplayNames', () => {
    it('should join by count', () => {
        expect(joinDisplayNames(['A'])).toBe('A');
        expect(joinDisplayNames(['A', 'B'])).toBe('A and B');
        expect(joinDisplayNames(['A', 'B', 'C', 'D'])).toBe('A, B, C, and D');
    });
});

describe('normalizeSeparators', () => {
    it('should replace semicolons before the "and" forms', () => {
        expect(normalizeSeparators('A; and B')).toBe('A, B');
        expect(normalizeSeparators('A and B,and C')).toBe('A, B, C');
    });
});
