import { getErrorMessage, isFileNotFound } from './errors';

describe('getErrorMessage', () => {
  it('reads the message of an Error', () => {
    expect(getErrorMessage(new RangeError('out of range'))).toBe('out of range');
  });

  it('passes strings through', () => {
    expect(getErrorMessage('plain')).toBe('plain');
  });

  it('describes other thrown values', () => {
    expect(getErrorMessage({ code: 42 })).toBe('{ code: 42 }');
    expect(getErrorMessage(7)).toBe('7');
    expect(getErrorMessage(undefined)).toBe('undefined');
  });
});

describe('isFileNotFound', () => {
  it('recognises ENOENT errors only', () => {
    expect(isFileNotFound(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe(true);
    expect(isFileNotFound(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe(false);
    expect(isFileNotFound('ENOENT')).toBe(false);
  });
});
