import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { errorCode, isMissingFileError } from '../fsErrors';

describe('isMissingFileError', () => {
    it('should recognise a real ENOENT from fs.promises', async () => {
        const missing = path.join(os.tmpdir(), 'corpus-qa-does-not-exist', 'manifest.json');

        const error = await fs.promises.readFile(missing).then(
            () => undefined,
            (reason: unknown) => reason
        );

        expect(isMissingFileError(error)).toBe(true);
    });

    it('should recognise plain objects carrying the code', () => {
        expect(isMissingFileError({ code: 'ENOENT' })).toBe(true);
        expect(isMissingFileError(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
    });

    it.each([
        ['another code', { code: 'EISDIR' }],
        ['no code', new Error('ENOENT')],
        ['a string', 'ENOENT'],
        ['null', null],
        ['a numeric code', { code: 2 }],
    ])('should reject %s', (_label, value) => {
        expect(isMissingFileError(value)).toBe(false);
    });
});

describe('errorCode', () => {
    it('should return string codes only', () => {
        expect(errorCode({ code: 'EACCES' })).toBe('EACCES');
        expect(errorCode({ code: 13 })).toBeUndefined();
        expect(errorCode(undefined)).toBeUndefined();
    });
});
