import type { KeySibling } from '../types/index.js';

const FIRST_LETTER = 'a'.charCodeAt(0);
const LAST_LETTER = 'z'.charCodeAt(0);

/**
 * A record cannot be keyed in its current state (e.g. it has no authors).
 */
export class InvalidRecordStateError extends Error {
    readonly code = 'INVALID_RECORD_STATE';

    constructor(
        message: string,
        public readonly field: string
    ) {
        super(message);
        this.name = 'InvalidRecordStateError';
    }
}

/**
 * All 26 letters are taken for a surname and year.
 */
export class KeyGenerationExhaustedError extends Error {
    readonly code = 'KEY_GENERATION_EXHAUSTED';

    constructor(
        public readonly surname: string,
        public readonly year: number | null
    ) {
        super(`No citation key letter left for ${surname} ${year ?? '(no year)'}`);
        this.name = 'KeyGenerationExhaustedError';
    }
}

function toLetter(code: number, surname: string, year: number | null): string {
    if (code > LAST_LETTER) {
        throw new KeyGenerationExhaustedError(surname, year);
    }
    return String.fromCharCode(code);
}

/**
 * Build a citation key `<Surname><Year><letter>`.
 *
 * `orderedSiblings` are records of the same year whose authors mention the
 * surname, ordered by month ascending, then id ascending. The letter advances
 * once for every sibling with the same first-author surname that comes before
 * the record itself. The record is matched by id only; an unpersisted record
 * (`selfId` null) never matches, so it lands after all of its siblings.
 *
 * @throws InvalidRecordStateError when the surname is empty
 * @throws KeyGenerationExhaustedError past 'z'
 */
export function generateCiteKey(
    firstAuthorSurname: string,
    year: number | null,
    orderedSiblings: Iterable<KeySibling>,
    selfId: number | null
): string {
    if (!firstAuthorSurname) {
        throw new InvalidRecordStateError('Record has no author to derive a citation key from', 'authors');
    }

    let letter = FIRST_LETTER;
    for (const sibling of orderedSiblings) {
        if (selfId !== null && sibling.id === selfId) break;
        if (sibling.surname === firstAuthorSurname) letter++;
    }

    return `${firstAuthorSurname}${year ?? ''}${toLetter(letter, firstAuthorSurname, year)}`;
}

/**
 * Advance the trailing letter of a generated key: "Smith2020a" → "Smith2020b".
 *
 * @throws KeyGenerationExhaustedError past 'z'
 */
export function nextCiteKey(citekey: string, surname: string, year: number | null): string {
    const last = citekey.charCodeAt(citekey.length - 1);
    if (Number.isNaN(last) || last < FIRST_LETTER || last > LAST_LETTER) {
        throw new InvalidRecordStateError(`Not a generated citation key: ${citekey}`, 'citekey');
    }
    return citekey.slice(0, -1) + toLetter(last + 1, surname, year);
}
