import { SpanProtector } from './span-protector';

describe('SpanProtector', () => {
  const protector = new SpanProtector();

  it('should reproduce a document byte for byte after protect and restore', () => {
    const docs = [
      'सूत्र $x^2$ और $$\\int_0^1 f(x) dx$$ तथा `print(a)` देखें',
      '$a$$b$',
      '`one` `two`\n$$E = mc^2$$\nकोई सूत्र नहीं',
    ];
    for (const doc of docs) {
      const protectedText = protector.protect(doc);
      expect(protectedText.restore(protectedText.text)).toBe(doc);
    }
  });

  it('should replace every span with a distinct placeholder', () => {
    const protectedText = protector.protect('क $x$ ख $y$ ग `z`');

    expect(protectedText.spans.size).toBe(3);
    expect([...protectedText.spans.values()]).toEqual(['`z`', '$x$', '$y$']);
    expect(protectedText.text).not.toContain('$');
    expect(protectedText.text).not.toContain('`');
  });

  it('should scan backticks before math so nested dollars stay in one span', () => {
    const protectedText = protector.protect('कोड `$a$` यहाँ');

    expect([...protectedText.spans.values()]).toEqual(['`$a$`']);
  });

  it('should prefer display math over inline math', () => {
    const protectedText = protector.protect('$$a+b$$');

    expect([...protectedText.spans.values()]).toEqual(['$$a+b$$']);
  });

  it('should leave spans that cross a line break alone', () => {
    const protectedText = protector.protect('$a\nb$');

    expect(protectedText.spans.size).toBe(0);
    expect(protectedText.text).toBe('$a\nb$');
  });

  it('should flag only lines that carry a placeholder', () => {
    const protectedText = protector.protect('सादा पंक्ति\nसूत्र $x$ यहाँ');
    const [plain, math] = protectedText.text.split('\n');

    expect(protectedText.hasPlaceholder(plain)).toBe(false);
    expect(protectedText.hasPlaceholder(math)).toBe(true);
  });

  it('should pick a placeholder tag that does not occur in the input', () => {
    const doc = 'पहले से \uE000SPAN0\uE001 मौजूद और $x$';
    const protectedText = protector.protect(doc);

    expect([...protectedText.spans.keys()]).toEqual(['\uE000SPAN_0\uE001']);
    expect(protectedText.hasPlaceholder('पहले से \uE000SPAN0\uE001 मौजूद')).toBe(false);
    expect(protectedText.restore(protectedText.text)).toBe(doc);
  });
});
