import { marked } from 'marked';
import DOMPurify from 'dompurify';
import { logger } from '@/utils/logger';

marked.setOptions({
  gfm: true,
  breaks: false,
});

const ALLOWED_TAGS = [
  'p', 'br', 'strong', 'em', 'b', 'i', 'u', 's', 'del', 'code', 'pre', 'blockquote',
  'ul', 'ol', 'li', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'a', 'img', 'hr',
  'table', 'thead', 'tbody', 'tr', 'th', 'td', 'span', 'div', 'input',
];

const ALLOWED_ATTR = [
  'href', 'src', 'class', 'id', 'name', 'alt', 'align', 'valign', 'disabled', 'checked', 'start', 'type',
];

const isHttpLike = (url: string) => /^https?:/i.test(url);

/** Absolute http(s) URL for `text`, `null` for any other protocol. */
export function sanitizeUrl(text: string, baseUrl: string = window.location.href): string | null {
  const trimmed = text.trim();
  if (isHttpLike(trimmed)) return trimmed;
  try {
    const url = new URL(trimmed, baseUrl);
    return isHttpLike(url.protocol) ? url.href : null;
  } catch {
    return null;
  }
}

let purifyConfigured = false;

const configurePurify = () => {
  if (purifyConfigured) return;
  purifyConfigured = true;

  DOMPurify.addHook('afterSanitizeAttributes', (node) => {
    if (!(node instanceof Element)) return;
    for (const name of ['href', 'src']) {
      const value = node.getAttribute(name);
      if (value === null) continue;
      const url = sanitizeUrl(value);
      if (url === null) {
        node.removeAttribute(name);
      } else {
        node.setAttribute(name, url);
      }
    }
    if (node.tagName === 'A') {
      node.setAttribute('target', '_blank');
      node.setAttribute('rel', 'noopener noreferrer');
    }
  });
};

export function sanitizeHtml(html: string): string {
  configurePurify();
  return DOMPurify.sanitize(html, {
    ALLOWED_TAGS,
    ALLOWED_ATTR,
    ADD_ATTR: ['target', 'rel'],
  });
}

/** Markdown to sanitized HTML. Falls back to escaped text. */
export function renderMarkdown(text: string): string {
  try {
    return sanitizeHtml(marked.parse(text, { async: false }));
  } catch (err) {
    logger.error('sanitize html failed', err);
    const div = document.createElement('div');
    div.textContent = text;
    return div.innerHTML;
  }
}
