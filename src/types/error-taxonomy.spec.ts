import { SnapshotCaptureError, describeError, errorMessage } from './error-taxonomy';

describe('error taxonomy', () => {
  it('should format a code with its title and detail', () => {
    expect(describeError('STATE_WRITE_FAILED', 'EACCES')).toBe(
      '[STATE_WRITE_FAILED] State Not Persisted: The snapshot could not be written. In-memory state is still updated. (EACCES)',
    );
  });

  it('should carry the capture code on SnapshotCaptureError', () => {
    const error = new SnapshotCaptureError('boom');

    expect(error.code).toBe('SNAPSHOT_CAPTURE_FAILED');
    expect(error.name).toBe('SnapshotCaptureError');
  });

  describe('errorMessage', () => {
    it('should read the message of an Error', () => {
      expect(errorMessage(new Error('disk full'))).toBe('disk full');
    });

    it('should read the message of an error-shaped object', () => {
      expect(errorMessage({ code: 'ENOENT', message: 'no such file' })).toBe('no such file');
    });

    it('should stringify anything else', () => {
      expect(errorMessage(42)).toBe('42');
    });
  });
});
