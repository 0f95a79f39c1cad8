/**
 * Content block extraction
 * Walks an article body in document order and emits text, image and code blocks
 */

import { ContentBlock } from '../../types/article';
import { logger } from '../../utils/logger';

const log = logger.child('extractor');

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const SKIPPED_TAGS = new Set(['SCRIPT', 'STYLE', 'NOSCRIPT']);
const TEXT_TAGS = new Set(['P', 'H1', 'H2', 'H3', 'H4', 'H5', 'H6']);
const IMAGE_SOURCE_ATTRIBUTES = ['src', 'data-src', 'data-original'];
const LINE_NUMBER_SELECTOR = '.pre-numbering, .line-numbers, .line-number';
const BARE_IMAGE_FILENAME = /^[\w-]+\.(png|jpg|jpeg|gif|svg|webp)$/i;

const LANGUAGE_TOKENS = [
  'python', 'javascript', 'java', 'cpp', 'c++', 'csharp', 'c#', 'php', 'ruby', 'go', 'rust',
  'swift', 'kotlin', 'typescript', 'sql', 'bash', 'shell', 'html', 'css', 'json', 'xml', 'yaml'
];

const LANGUAGE_PATTERN = new RegExp(
  `(?:^|\\s)(?:language-|lang-|brush:\\s*)?(${LANGUAGE_TOKENS.map(escapeRegExp).join('|')})(?![\\w+#-])`,
  'i'
);

export interface ExtractOptions {
  /** Text shorter than or equal to this many characters is dropped */
  minTextLength?: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function classOf(element: Element): string {
  return element.getAttribute('class') ?? '';
}

/**
 * Best-effort language from class names such as `language-python`,
 * `lang-go` or `brush: sql`, falling back to a nested <code>.
 * Returns '' when nothing matches.
 */
export function detectCodeLanguage(element: Element): string {
  const own = classOf(element).match(LANGUAGE_PATTERN);
  if (own) return own[1].toLowerCase();

  if (element.tagName === 'PRE') {
    const code = element.querySelector('code');
    const nested = code ? classOf(code).match(LANGUAGE_PATTERN) : null;
    if (nested) return nested[1].toLowerCase();
  }

  return '';
}

function readCodeText(element: Element): string {
  const clone = element.cloneNode(true);
  if (!isElement(clone)) return '';
  clone.querySelectorAll(LINE_NUMBER_SELECTOR).forEach(numbering => numbering.remove());
  return (clone.textContent ?? '').trim();
}

function resolveImageUrl(image: Element): string | null {
  for (const attribute of IMAGE_SOURCE_ATTRIBUTES) {
    const raw = image.getAttribute(attribute)?.trim();
    if (!raw) continue;

    try {
      const resolved = new URL(raw, image.ownerDocument.baseURI);
      if (resolved.protocol === 'http:' || resolved.protocol === 'https:') {
        return resolved.href;
      }
    } catch {
      // relative source with no usable base
      continue;
    }
  }
  return null;
}

function acceptText(text: string, minTextLength: number): boolean {
  return text.length > minTextLength && !BARE_IMAGE_FILENAME.test(text);
}

function walk(node: Node, blocks: ContentBlock[], minTextLength: number): void {
  if (node.nodeType === TEXT_NODE) {
    const text = (node.textContent ?? '').trim();
    if (acceptText(text, minTextLength)) {
      blocks.push({ kind: 'text', value: text });
    }
    return;
  }

  if (!isElement(node)) return;

  const tag = node.tagName.toUpperCase();
  if (SKIPPED_TAGS.has(tag)) return;

  const recurse = () => {
    for (const child of Array.from(node.childNodes)) {
      walk(child, blocks, minTextLength);
    }
  };

  if (tag === 'IMG') {
    const src = resolveImageUrl(node);
    if (src) blocks.push({ kind: 'image', value: src });
    return;
  }

  if (tag === 'PRE' || tag === 'CODE') {
    // <code> inside a <pre> belongs to the <pre> block
    if (tag === 'CODE' && node.parentElement?.tagName.toUpperCase() === 'PRE') return;

    const code = readCodeText(node);
    if (code) {
      blocks.push({ kind: 'code', value: code, language: detectCodeLanguage(node) });
    }
    return;
  }

  if (TEXT_TAGS.has(tag)) {
    // Mixed paragraphs are split so embedded images and code keep their place
    if (node.querySelector('img, pre, code')) {
      recurse();
      return;
    }
    const text = (node.textContent ?? '').trim();
    if (acceptText(text, minTextLength)) {
      blocks.push({ kind: 'text', value: text });
    }
    return;
  }

  recurse();
}

/**
 * Extract ordered content blocks from an article body.
 * Falls back to the flattened text of `root` when the structured pass
 * fails or finds nothing; an empty result means there was no content.
 */
export function extractContentBlocks(root: Element, options: ExtractOptions = {}): ContentBlock[] {
  const minTextLength = options.minTextLength ?? 10;

  try {
    const blocks: ContentBlock[] = [];
    walk(root, blocks, minTextLength);
    if (blocks.length > 0) return blocks;
  } catch (error) {
    log.error('Structured extraction failed, falling back to plain text', error);
  }

  const text = (root.textContent ?? '').trim();
  return text ? [{ kind: 'text', value: text }] : [];
}
