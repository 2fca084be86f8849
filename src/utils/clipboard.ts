import { logger } from '@/utils/logger';

// Select a hidden textarea and use the legacy copy command.
function copyWithSelection(text: string): boolean {
  if (typeof document === 'undefined') return false;

  const textArea = document.createElement('textarea');
  textArea.value = text;
  textArea.setAttribute('readonly', '');
  textArea.style.position = 'fixed';
  textArea.style.left = '-999999px';
  textArea.style.top = '-999999px';
  document.body.appendChild(textArea);
  textArea.focus();
  textArea.select();

  try {
    return document.execCommand('copy');
  } catch (err) {
    logger.error('could not copy to clipboard', err);
    return false;
  } finally {
    document.body.removeChild(textArea);
  }
}

/** Copy `text` to the clipboard; resolves to `false` when nothing was copied. */
export async function copyToClipboard(text: string): Promise<boolean> {
  if (typeof navigator !== 'undefined' && navigator.clipboard?.writeText) {
    try {
      await navigator.clipboard.writeText(text);
      return true;
    } catch (err) {
      logger.warn('Clipboard API unavailable, using selection fallback', err);
    }
  }
  return copyWithSelection(text);
}
