import { describe, it, expect } from 'vitest';
import { escapeHtml, renderIndexPage } from './index-page.js';

describe('escapeHtml', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml(`<b class="x">Tom & Jerry's</b>`)).toBe(
      '&lt;b class=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/b&gt;'
    );
  });
});

describe('renderIndexPage', () => {
  it('should show a notice when nothing is streaming', () => {
    const html = renderIndexPage('Tank', []);

    expect(html).toContain('<p class="empty">No cameras are streaming.</p>');
    expect(html).toContain('Direct stream URLs: </p>');
  });
});
