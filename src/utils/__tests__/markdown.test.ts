import { describe, expect, it } from 'vitest';
import { renderMarkdown, sanitizeUrl } from '../markdown';

const render = (text: string) => {
  const div = document.createElement('div');
  div.innerHTML = renderMarkdown(text);
  return div;
};

describe('sanitizeUrl', () => {
  it('resolves relative URLs against the base', () => {
    expect(sanitizeUrl('/docs/index.html', 'https://pbs.example:8007/')).toBe('https://pbs.example:8007/docs/index.html');
  });

  it('rejects other protocols', () => {
    expect(sanitizeUrl('javascript:alert(1)')).toBeNull();
    expect(sanitizeUrl('mailto:admin@example.com')).toBeNull();
  });

  it('keeps http(s) URLs as written', () => {
    expect(sanitizeUrl(' https://www.proxmox.com ')).toBe('https://www.proxmox.com');
  });
});

describe('renderMarkdown', () => {
  it('renders basic markup', () => {
    const div = render('Some **bold** text');
    expect(div.querySelector('strong')?.textContent).toBe('bold');
  });

  it('opens links in a new tab', () => {
    const link = render('[Wiki](https://pve.proxmox.com/wiki)').querySelector('a');
    expect(link?.getAttribute('href')).toBe('https://pve.proxmox.com/wiki');
    expect(link?.getAttribute('target')).toBe('_blank');
    expect(link?.getAttribute('rel')).toBe('noopener noreferrer');
  });

  it('drops script links and elements', () => {
    const div = render('[click](javascript:alert(1))\n\n<script>alert(1)</script>');
    expect(div.querySelector('a[href]')).toBeNull();
    expect(div.querySelector('script')).toBeNull();
  });
});
