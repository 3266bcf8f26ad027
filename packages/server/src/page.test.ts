import { PlainPageRenderer } from './page.js';

describe('PlainPageRenderer', () => {
  const renderer = new PlainPageRenderer();

  it('should embed the view as escaped JSON', () => {
    const html = renderer.render({ role: 'mobile', sessionId: 'abc' });

    expect(html).toContain('<body data-state="{&quot;role&quot;:&quot;mobile&quot;,&quot;sessionId&quot;:&quot;abc&quot;}">');
    expect(html).toContain('<main id="app"></main>');
  });

  it('should escape the denial reason', () => {
    const html = renderer.render({ role: 'denied', reason: '<b>no</b> & "never"' });

    expect(html).toContain('<title>Access denied</title>');
    expect(html).toContain('<p>&lt;b&gt;no&lt;/b&gt; &amp; &quot;never&quot;</p>');
  });
});
