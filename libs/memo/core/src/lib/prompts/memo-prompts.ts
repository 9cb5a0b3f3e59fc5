/**
 * Memo Prompt Templates
 *
 * Text blocks the PromptAssembler and the summarizer stitch together.
 * Placeholders are filled by the builder functions, never by string replace.
 */

export const buildMemoIntro = (companyName: string, situationType: string): string =>
  `You are an institutional investment analyst writing a professional memo on a special situation involving ${companyName}.
The situation is: **${situationType}**`;

export const buildSourceBlock = (sourceText: string): string =>
  `Below is the internal company information extracted from various files:
"""${sourceText}"""`;

export const buildStructureBlock = (structure: string): string =>
  `Using the structure below, generate a well-written investment memo. Be factual, insightful, and clear.
Write every section heading on its own line, exactly as it appears in the structure (without the indented hints), followed by that section's prose.
Structure:
${structure}`;

export const buildUserPeersValuationPrompt = (
  parentPeers: string[],
  spincoPeers: string[]
): string => `# Valuation Analysis
The user has provided the following peer tickers:
- ParentCo Peers: ${parentPeers.join(', ')}
- SpinCo Peers: ${spincoPeers.join(', ')}

Please fetch or approximate public LTM EV/EBITDA and P/E multiples for these peers.
Then apply these multiples to the extracted LTM financials of ParentCo and SpinCo to estimate standalone valuations.
Compare the sum of these to the pre-spin ParentCo's market cap to estimate the value unlock potential.`;

export const AI_PEERS_VALUATION_PROMPT = `# Valuation Analysis
Based on the business descriptions of ParentCo and SpinCo, identify 3–5 appropriate public peer companies for each.
Then, estimate their LTM EV/EBITDA and P/E multiples, apply them to the extracted financials of ParentCo and SpinCo,
and compute implied valuations. Finally, compare the combined value to the pre-spin ParentCo market cap and indicate
the potential value unlock.`;

export const MARKET_DATA_REFERENCE_HEADER = `Market data reference (retrieved from a market-data service; prefer these figures over estimates where available):`;

export const buildSectionSummaryPrompt = (sectionTitle: string, sectionText: string): string =>
  `You are an institutional research analyst preparing a financial infographic.
Summarize the section titled "${sectionTitle}" into 3 to 5 concise bullet points.
Each point should be a single sentence, highlighting key insights clearly and professionally.
Section:
"""${sectionText}"""`;
