/**
 * Prompt for boundary detection over a stamped catalog
 */

export const TECHNICAL_SHEET_PROMPT = `You analyze product catalogs and locate the technical sheets inside them.
Identify where each product technical sheet begins and which pages it covers.

Every page carries an identifier at the top right ("PAGE-ID: n") and a small tag at the bottom left ("<page:n>").
Use these identifiers as page numbers, not the numbers printed by the catalog itself.
If the catalog has a table of contents, use it to help locate the sheets.

Rules:
- A technical sheet describes exactly ONE product, never a product family or a category overview
- A sheet can span one or several consecutive pages
- Subtitles may separate sheets of different products within the same family
- Write the product names in the language of the document

Answer with JSON only, no preamble or explanation, in exactly this format:
[
  {
    "product": "product title or code",
    "confidence": 0.0,
    "pages": [1, 2],
    "reason": "why these pages form one technical sheet"
  }
]`;

export const ANALYSIS_CONTEXT_PREFIX = 'Document analysis information: ';

/**
 * Text part of the detection request: the structural analysis followed by the
 * instructions
 */
export function buildDetectionPrompt(analysisJson: string, prompt = TECHNICAL_SHEET_PROMPT): string {
  return `${ANALYSIS_CONTEXT_PREFIX}${analysisJson}\n\n${prompt}`;
}
