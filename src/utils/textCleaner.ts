// Control characters except tab, newline and carriage return, plus DEL and C1 controls.
const NON_PRINTABLE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\uFEFF\uFFFD]/g;

// Anything that is not a letter, a digit, whitespace or basic punctuation.
const EXTRACTION_ARTIFACTS = /[^\p{L}\p{N}\s.,!?;:\-()@+#/&']/gu;

export function cleanText(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .normalize('NFKC')
    .replace(NON_PRINTABLE, ' ')
    .replace(EXTRACTION_ARTIFACTS, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function truncate(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : text.slice(0, maxChars);
}
