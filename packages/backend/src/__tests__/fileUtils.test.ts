import { FileFormat } from '../config/constants';
import { getFileFormat, validateFile } from '../utils/file.utils';

const LIMITS = { maxFileSize: 1024 * 1024, allowedFileTypes: ['pdf', 'png', 'jpg'] };

describe('validateFile', () => {
  it('should accept a supported file', () => {
    expect(validateFile('BL_0001.PDF', 2048, LIMITS)).toEqual({
      valid: true,
      format: FileFormat.PDF,
      mimeType: 'application/pdf',
      size: '2.0 KB',
    });
  });

  it('should reject files over the size limit', () => {
    const check = validateFile('scan.png', 2 * 1024 * 1024, LIMITS);
    expect(check.valid).toBe(false);
    expect(check.error).toBe('File too large (2.0 MB). Maximum allowed: 1.0 MB');
  });

  it('should reject empty files', () => {
    expect(validateFile('scan.png', 0, LIMITS).error).toBe('File is empty');
  });

  it('should reject unsupported extensions', () => {
    expect(validateFile('notes.txt', 10, LIMITS).error).toBe(
      'Unsupported file type: txt. Use: PDF, PNG, JPG'
    );
    expect(validateFile('scan.tiff', 10, LIMITS).error).toBe(
      'Unsupported file type: tiff. Use: PDF, PNG, JPG'
    );
  });

  it('should map extensions to formats', () => {
    expect(getFileFormat('photo.jpeg')).toBe(FileFormat.IMAGE);
    expect(getFileFormat('archive.zip')).toBeNull();
  });
});
