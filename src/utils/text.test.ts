import { escapeHtml, fillTemplate, formatIsoDate, splitBullets, splitParagraphs } from './text.js';

describe('text', () => {
  describe('escapeHtml', () => {
    it('should escape all five special characters', () => {
      expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
        '&lt;a href=&quot;x&quot;&gt;Tom &amp; &#x27;Jerry&#x27;&lt;/a&gt;'
      );
    });

    it('should leave plain text unchanged', () => {
      expect(escapeHtml('Plain text 123')).toBe('Plain text 123');
    });
  });

  describe('splitParagraphs', () => {
    it('should treat the literal \\n escape as a newline', () => {
      expect(splitParagraphs('One\\n\\nTwo')).toEqual(['One', 'Two']);
    });

    it('should split on runs of blank lines and trim each paragraph', () => {
      expect(splitParagraphs('  first  \n   \n\n  second\n')).toEqual(['first', 'second']);
    });

    it('should keep single newlines inside a paragraph', () => {
      expect(splitParagraphs('line one\nline two')).toEqual(['line one\nline two']);
    });

    it('should return nothing for blank input', () => {
      expect(splitParagraphs('')).toEqual([]);
      expect(splitParagraphs(' \n\n ')).toEqual([]);
    });

    it('should be stable when paragraphs are rejoined with blank lines', () => {
      const once = splitParagraphs('a\\n\\n\\nb\n\n c ');
      expect(splitParagraphs(once.join('\n\n'))).toEqual(once);
    });
  });

  describe('splitBullets', () => {
    it('should split on pipes, trim and drop empties', () => {
      expect(splitBullets(' alpha | | beta|')).toEqual(['alpha', 'beta']);
    });

    it('should return nothing for an empty field', () => {
      expect(splitBullets('')).toEqual([]);
    });
  });

  describe('formatIsoDate', () => {
    it('should zero-pad month and day', () => {
      expect(formatIsoDate(new Date(2024, 0, 5))).toBe('2024-01-05');
    });
  });

  describe('fillTemplate', () => {
    it('should substitute known names and leave unknown ones', () => {
      expect(fillTemplate('{{a}}-{{b}}-{{ c }}', { a: '1' })).toBe('1-{{b}}-{{ c }}');
    });

    it('should insert values literally', () => {
      expect(fillTemplate('[{{x}}]', { x: '$& $1' })).toBe('[$& $1]');
    });

    it('should not resolve inherited object properties', () => {
      expect(fillTemplate('{{constructor}}', {})).toBe('{{constructor}}');
    });
  });
});
