import { Marked } from "marked";

const markdown = new Marked({ gfm: true, breaks: false, async: false });

/**
 * Convert the generator's Markdown (headings, bold, lists) into the HTML that
 * note fields store. Blank input stays blank.
 */
export function markdownToHtml(text: string): string {
  const source = text.trim();
  if (source === "") return "";
  return markdown.parse(source, { async: false }).trim();
}
