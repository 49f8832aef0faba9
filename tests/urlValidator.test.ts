import { URLValidator } from '../src/utils/UrlValidator';

describe('URLValidator', () => {
  const validator = new URLValidator();

  it.each([
    ['https://www.youtube.com/watch?v=dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['https://youtu.be/dQw4w9WgXcQ?t=10', 'dQw4w9WgXcQ'],
    ['https://m.youtube.com/watch?feature=share&v=dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['https://www.youtube.com/shorts/dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['https://www.youtube.com/embed/dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['https://www.youtube.com/live/dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
  ])('should accept %s', (url, videoId) => {
    expect(validator.validate(url)).toEqual({ valid: true, videoId });
  });

  it('should require a URL', () => {
    expect(validator.validate('  ')).toEqual({
      valid: false,
      error: 'empty_url',
      message: 'URL is required',
    });
  });

  it('should reject malformed URLs and other protocols', () => {
    expect(validator.validate('not-a-valid-url').message).toBe('Invalid YouTube URL');
    expect(validator.validate('ftp://youtube.com/watch?v=dQw4w9WgXcQ').error).toBe(
      'invalid_format',
    );
  });

  it('should reject other hosts, including look-alikes', () => {
    expect(validator.validate('https://vimeo.com/123456').error).toBe('unsupported_platform');
    expect(validator.isValid('https://notyoutube.com/watch?v=dQw4w9WgXcQ')).toBe(false);
  });

  it('should return null when no video id is present', () => {
    expect(validator.extractVideoId('https://www.youtube.com/feed/trending')).toBeNull();
  });
});
