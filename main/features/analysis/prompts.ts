/**
 * Context analysis prompts.
 *
 * The primary prompt asks for a JSON object; the simplified prompt, used
 * when the first answer is empty or malformed, asks for two labelled lines,
 * which small local models follow more reliably.
 */

export const PRIMARY_PROMPT_TEMPLATE = `You will be given OCR text from a Facebook screenshot.
Return a JSON object with keys: page_name and summary.

1) page_name: who ORIGINALLY POSTED this content (the main poster, not commenters). Look for:
   - Facebook page names (e.g. a news outlet or a local government office)
   - Facebook group names (e.g. a buy-and-sell or community updates group)
   - The name of the individual who made the original post
   IGNORE commenters, people who liked or reacted, sponsored labels, timestamps and UI elements.
   The poster's name is usually at the TOP of the post, before the main content.
   Return "Unknown" only if you truly cannot find the original poster.

2) summary: EXACTLY three sentences. The first sentence MUST start with "This post is".
   - Describe what the original post is about.
   - Describe the general sentiment of commenters if there are comments (e.g. supportive, mixed, critical).
   Focus on substance, not technical details.

Return ONLY valid JSON. OCR TEXT:

{{ocr_text}}`;

export const SIMPLIFIED_PROMPT_TEMPLATE = `Read this text copied from a Facebook post.
Answer with exactly two lines and nothing else:
SOURCE: <name of the page, group or person who made the post, or Unknown>
SUMMARY: <three sentences starting with "This post is", covering the post and how commenters feel>

TEXT:
{{ocr_text}}`;

// Keeps prompts within a small model's context window
export const MAX_PROMPT_TEXT_CHARS = 6000;

function fillTemplate(template: string, ocrText: string): string {
    const text = ocrText.length > MAX_PROMPT_TEXT_CHARS ? ocrText.slice(0, MAX_PROMPT_TEXT_CHARS) : ocrText;
    // Function replacement so '$' sequences in OCR text are not interpreted
    return template.replace('{{ocr_text}}', () => text);
}

export function buildPrimaryPrompt(ocrText: string): string {
    return fillTemplate(PRIMARY_PROMPT_TEMPLATE, ocrText);
}

export function buildSimplifiedPrompt(ocrText: string): string {
    return fillTemplate(SIMPLIFIED_PROMPT_TEMPLATE, ocrText);
}
