import { SectionSummary } from '@special-sits/shared/types';
import { DISCLAIMER, InfographicComposer, escapeHtml } from './infographic-composer';
import { CARD_PALETTE, cardStyleFor } from './infographic-palette';

const summary = (title: string, bullets: string[] = ['Point.']): SectionSummary => ({
  title,
  bullets,
  failed: false,
});

describe('InfographicComposer', () => {
  const composer = new InfographicComposer();

  it('should produce a standalone page with header and disclaimer', () => {
    const html = composer.compose('Acme Corp', [summary('Deal Summary')]);

    expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(html).toContain('<script src="https://cdn.tailwindcss.com"></script>');
    expect(html).toContain('<title>Acme Corp – Infographic</title>');
    expect(html).toContain(
      '<h1 class="text-3xl md:text-4xl font-bold text-gray-800 mb-2">Acme Corp – Investment Memo Infographic</h1>'
    );
    expect(html).toContain(`<p class="text-xs text-gray-400">${DISCLAIMER}</p>`);
  });

  it('should render one card per section with one item per bullet', () => {
    const html = composer.compose('Acme', [
      summary('Deal Summary', ['Cash offer.', 'Closing in Q3.']),
      summary('Spread Analysis and Arbitrage Opportunity', ['Spread is 4%.']),
    ]);

    expect(html.match(/<div class="shadow-lg/g)).toHaveLength(2);
    expect(html.match(/<li>/g)).toHaveLength(3);
    expect(html).toContain('            <li>Cash offer.</li>\n            <li>Closing in Q3.</li>');
    expect(html).toContain('<span class="section-icon">💼</span>Deal Summary');
    expect(html).toContain('<span class="section-icon">🏢</span>Spread Analysis and Arbitrage Opportunity');
  });

  it('should cycle the card palette every ten sections', () => {
    const sections = Array.from({ length: 11 }, (_, index) => summary(`Section ${index}`));

    const html = composer.compose('Acme', sections);

    expect(html).toContain('border-l-4 border-gray-600 bg-gray-50');
    expect(html.match(/border-l-4 border-blue-600 bg-blue-50/g)).toHaveLength(2);
  });

  it('should escape interpolated text', () => {
    const html = composer.compose('A&B <Holdings>', [summary('Risks', ['Price < "fair" value'])]);

    expect(html).toContain('A&amp;B &lt;Holdings&gt; – Investment Memo Infographic');
    expect(html).toContain('<li>Price &lt; &quot;fair&quot; value</li>');
    expect(html).not.toContain('<Holdings>');
  });

  it('should render a page with no cards for no sections', () => {
    const html = composer.compose('Acme', []);

    expect(html).not.toContain('shadow-lg');
  });

  describe('helpers', () => {
    it('should escape the five HTML special characters', () => {
      expect(escapeHtml(`&<>"'`)).toBe('&amp;&lt;&gt;&quot;&#39;');
    });

    it('should pick styles by index modulo the palette size', () => {
      expect(CARD_PALETTE).toHaveLength(10);
      expect(cardStyleFor(0)).toBe(CARD_PALETTE[0]);
      expect(cardStyleFor(13)).toBe(CARD_PALETTE[3]);
    });
  });
});
