import {
  classifyFailure,
  createKeywordClassifier,
  describeFailure,
} from '../src/download/core/ErrorClassifier';

describe('ErrorClassifier', () => {
  it('should treat bot checks as retriable', () => {
    expect(
      classifyFailure("ERROR: [youtube] abc: Sign in to confirm you're not a bot"),
    ).toBe('retriable');
  });

  it('should treat missing formats as retriable', () => {
    expect(classifyFailure('ERROR: Requested format is not available')).toBe('retriable');
  });

  it('should keep private videos terminal even though they mention signing in', () => {
    expect(
      classifyFailure("ERROR: [youtube] abc: Private video. Sign in if you've been granted access"),
    ).toBe('terminal');
  });

  it('should treat region blocks and copyright claims as terminal', () => {
    expect(
      classifyFailure('The uploader has not made this video available in your country'),
    ).toBe('terminal');
    expect(classifyFailure('This video contains content blocked on copyright grounds')).toBe(
      'terminal',
    );
  });

  it('should return unknown for anything else', () => {
    expect(classifyFailure('HTTP Error 500: Internal Server Error')).toBe('unknown');
  });

  it('should build classifiers from custom keyword lists', () => {
    const classify = createKeywordClassifier({ terminal: ['gone'], retriable: ['busy'] });
    expect(classify('Server BUSY')).toBe('retriable');
    expect(classify('busy and gone')).toBe('terminal');
    expect(classify('Sign in')).toBe('unknown');
  });

  describe('describeFailure', () => {
    it('should map known failures to readable messages', () => {
      expect(describeFailure('Private video')).toBe('This video is private');
      expect(describeFailure('not made this video available in your country')).toBe(
        'Video not available in your region',
      );
      expect(describeFailure('Sign in to confirm')).toBe(
        'The video service is blocking this server. Try again later',
      );
      expect(describeFailure('Requested format is not available')).toBe(
        'The requested quality is not available for this video',
      );
    });

    it('should fall back to a generic message', () => {
      expect(describeFailure(undefined)).toBe('Failed to trim video. Check video availability.');
      expect(describeFailure('exit status 1')).toBe(
        'Failed to trim video. Check video availability.',
      );
    });
  });
});
