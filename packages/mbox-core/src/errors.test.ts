import { describe, expect, it } from 'vitest';
import {
  IOFailureError,
  MalformedMessageError,
  MboxError,
  SessionNotFoundError,
  toLoadErrorInfo,
} from './errors';

describe('MboxError', () => {
  it('carries a stable code and serialises to LoadErrorInfo', () => {
    const err = new IOFailureError('/mail/inbox.mbox', new Error('EACCES: permission denied'));

    expect(err).toBeInstanceOf(MboxError);
    expect(err.code).toBe('IO_FAILURE');
    expect(err.message).toBe('Cannot read /mail/inbox.mbox: EACCES: permission denied');
    expect(err.toJSON()).toEqual({ code: 'IO_FAILURE', message: err.message });
  });

  it('names the byte offset of a malformed message', () => {
    const err = new MalformedMessageError(4096, 'header line without a name');
    expect(err.message).toBe('Malformed message at byte 4096: header line without a name');
    expect(err.offset).toBe(4096);
  });
});

describe('toLoadErrorInfo', () => {
  it('keeps the code of core errors', () => {
    expect(toLoadErrorInfo(new SessionNotFoundError('abc'))).toEqual({
      code: 'SESSION_NOT_FOUND',
      message: 'Invalid MBOX session: abc',
    });
  });

  it('reports anything else as an I/O failure', () => {
    expect(toLoadErrorInfo(new Error('disk gone'))).toEqual({
      code: 'IO_FAILURE',
      message: 'disk gone',
    });
    expect(toLoadErrorInfo('stringly')).toEqual({ code: 'IO_FAILURE', message: 'stringly' });
  });
});
