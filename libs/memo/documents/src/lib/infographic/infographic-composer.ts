import { Injectable } from '@nestjs/common';
import { SectionSummary } from '@special-sits/shared/types';
import { cardStyleFor } from './infographic-palette';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (text: string): string =>
  text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

export const DISCLAIMER = 'This document is for informational purposes only. Not investment advice.';

/**
 * Standalone HTML infographic: one styled card per summarized section.
 */
@Injectable()
export class InfographicComposer {
  compose(companyName: string, sections: SectionSummary[]): string {
    const company = escapeHtml(companyName);
    const cards = sections.map((section, index) => this.renderCard(section, index)).join('\n');

    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0"/>
    <title>${company} – Infographic</title>
    <script src="https://cdn.tailwindcss.com"></script>
    <link href="https://fonts.googleapis.com/css2?family=Inter:wght@400;600;700&display=swap" rel="stylesheet">
    <style>
        body { font-family: 'Inter', sans-serif; background-color: #f9fafb; color: #1f2937; }
        .section-icon { font-size: 1.4rem; margin-right: 0.6rem; }
    </style>
</head>
<body class="px-4 py-8 md:px-6 md:py-10 max-w-7xl mx-auto">
    <header class="text-center mb-12">
        <h1 class="text-3xl md:text-4xl font-bold text-gray-800 mb-2">${company} – Investment Memo Infographic</h1>
    </header>
    <main class="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-3 gap-6">
${cards}
    </main>
    <footer class="text-center mt-12">
        <p class="text-xs text-gray-400">${DISCLAIMER}</p>
    </footer>
</body>
</html>
`;
  }

  private renderCard(section: SectionSummary, index: number): string {
    const { icon, borderClass, backgroundClass } = cardStyleFor(index);
    const items = section.bullets
      .map((bullet) => `            <li>${escapeHtml(bullet)}</li>`)
      .join('\n');

    return `        <div class="shadow-lg rounded-xl p-5 transition-transform hover:scale-[1.02] duration-300 ease-in-out border-l-4 ${borderClass} ${backgroundClass}">
            <h2 class="text-lg font-semibold text-gray-800 mb-3 flex items-center">
                <span class="section-icon">${icon}</span>${escapeHtml(section.title)}
            </h2>
            <ul class="list-disc text-sm text-gray-700 space-y-2 pl-5 leading-relaxed">
${items}
            </ul>
        </div>`;
  }
}
