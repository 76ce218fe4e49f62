import * as test from 'node:test';
import * as assert from 'node:assert';
import { parseModuleName, toPathForm } from '../modules.js';
import { classifyCodeBlock, DEFAULT_TITLE, PageContext, processPage } from '../postprocess.js';
import { createConverter } from '../renderer.js';
import { AllowList, ModuleIdentifier } from '../types.js';

const { describe, it } = test;

function moduleNamed(name: string): ModuleIdentifier {
  const id = parseModuleName(name);
  assert.ok(id, `invalid module name ${name}`);
  return id;
}

function context(allowList: AllowList = [/(?:)/]): PageContext {
  return {
    currentModule: moduleNamed('Guides'),
    allowList,
    externalBaseUrl: 'https://metacpan.org/pod/',
    localUrl: module => `/perldoc/${toPathForm(module)}`
  };
}

describe('processPage links', () => {
  const html = '<p><a href="https://metacpan.org/pod/Foo::Bar">Foo::Bar</a></p>';

  it('should point allowed modules at the local browser', () => {
    const page = processPage(html, context([/^Foo/]));
    assert.strictEqual(page.html, '<p><a href="/perldoc/Foo/Bar">Foo::Bar</a></p>');
  });

  it('should leave disallowed modules on the external site', () => {
    const page = processPage(html, context([/^Baz/]));
    assert.strictEqual(page.html, html);
  });

  it('should accept slash-joined names and keep fragments', () => {
    const page = processPage('<a href="https://metacpan.org/pod/Foo/Bar#new">new</a>', context());
    assert.strictEqual(page.html, '<a href="/perldoc/Foo/Bar#new">new</a>');
  });

  it('should turn section links into the current page into fragments', () => {
    const page = processPage('<a href="https://metacpan.org/pod/Guides#views">views</a>', context());
    assert.strictEqual(page.html, '<a href="#views">views</a>');
  });

  it('should not touch unrelated links', () => {
    const input = '<a href="https://example.com/">elsewhere</a><a href="#toc">top</a>';
    assert.strictEqual(processPage(input, context()).html, input);
  });
});

describe('processPage code blocks', () => {
  it('should classify shell transcripts', () => {
    assert.strictEqual(classifyCodeBlock('$ perl script.pl'), 'transcript');
    assert.strictEqual(classifyCodeBlock('  Usage: docviewer [options]'), 'transcript');
  });

  it('should classify code samples', () => {
    assert.strictEqual(classifyCodeBlock('my $x = Foo->bar;'), 'sample');
    assert.strictEqual(classifyCodeBlock('use strict;'), 'sample');
    assert.strictEqual(classifyCodeBlock('@items'), 'sample');
  });

  it('should prefer transcript over sample', () => {
    assert.strictEqual(classifyCodeBlock('$ echo $HOME'), 'transcript');
  });

  it('should leave other blocks plain', () => {
    assert.strictEqual(classifyCodeBlock('hello world'), 'plain');
  });

  it('should add the highlighting class to samples only', () => {
    const page = processPage(
      '<pre><code>$ perl script.pl</code></pre><pre><code class="language-perl">my $x = Foo-&gt;bar;</code></pre>',
      context()
    );
    assert.strictEqual(
      page.html,
      '<pre><code>$ perl script.pl</code></pre><pre><code class="language-perl prettyprint">my $x = Foo-&gt;bar;</code></pre>'
    );
  });

  it('should ignore inline code', () => {
    const input = '<p><code>my $x</code></p>';
    assert.strictEqual(processPage(input, context()).html, input);
  });
});

describe('processPage headings', () => {
  it('should group headings under each h1', () => {
    const page = processPage('<h1 id="a">A</h1><h2 id="a1">A.1</h2><h1 id="b">B</h1>', context());
    assert.deepStrictEqual(page.toc, [
      [{ text: 'A', href: '#a' }, { text: 'A.1', href: '#a1' }],
      [{ text: 'B', href: '#b' }]
    ]);
  });

  it('should open a group for a leading heading of any level', () => {
    const page = processPage('<h3 id="x">X</h3>', context());
    assert.deepStrictEqual(page.toc, [[{ text: 'X', href: '#x' }]]);
  });

  it('should ignore headings below h4', () => {
    const page = processPage('<h1 id="a">A</h1><h5 id="e">E</h5>', context());
    assert.deepStrictEqual(page.toc, [[{ text: 'A', href: '#a' }]]);
  });

  it('should replace heading content with a permalink and a link to the contents', () => {
    const page = processPage('<h2 id="options">The <code>options</code></h2>', context());
    assert.strictEqual(
      page.html,
      '<h2 id="options"><a href="#options" class="permalink">#</a><a href="#toc">The options</a></h2>'
    );
    assert.deepStrictEqual(page.toc, [[{ text: 'The options', href: '#options' }]]);
  });

  it('should give headings without an id a unique one', () => {
    const page = processPage('<h1 id="intro">Intro</h1><h2>Intro</h2>', context());
    assert.deepStrictEqual(page.toc, [[{ text: 'Intro', href: '#intro' }, { text: 'Intro', href: '#intro-1' }]]);
  });
});

describe('processPage title', () => {
  it('should use the paragraph after the first h1', () => {
    assert.strictEqual(processPage('<h1>T</h1><p>Intro</p>', context()).title, 'Intro');
  });

  it('should skip whitespace between the heading and the paragraph', () => {
    assert.strictEqual(processPage('<h1 id="name">NAME</h1>\n<p>Guides - the manual</p>\n', context()).title, 'Guides - the manual');
  });

  it('should fall back to the default title without an h1', () => {
    assert.strictEqual(processPage('<h2>T</h2><p>Intro</p>', context()).title, DEFAULT_TITLE);
  });

  it('should fall back when the h1 is not followed by a paragraph', () => {
    assert.strictEqual(processPage('<h1>T</h1><pre><code>x</code></pre><p>Later</p>', context()).title, DEFAULT_TITLE);
  });
});

describe('processPage degenerate input', () => {
  it('should handle empty input', () => {
    assert.deepStrictEqual(processPage('', context()), { html: '', title: DEFAULT_TITLE, toc: [] });
  });

  it('should handle malformed input', () => {
    const page = processPage('<h1 id="a">A<p>unclosed', context());
    assert.deepStrictEqual(page.toc, [[{ text: 'Aunclosed', href: '#a' }]]);
  });
});

describe('processPage with converted markup', () => {
  it('should process a converted document end to end', () => {
    const result = createConverter().convert('# NAME\n\nFoo::Bar - bars\n\n# SEE ALSO\n\nL<Foo::Baz/new>\n');
    assert.ok(result.ok);
    const page = processPage(result.html, context([/^Foo::Baz$/]));
    assert.strictEqual(page.title, 'Foo::Bar - bars');
    assert.deepStrictEqual(page.toc, [
      [{ text: 'NAME', href: '#name' }],
      [{ text: 'SEE ALSO', href: '#see-also' }]
    ]);
    assert.ok(page.html.includes('<a href="/perldoc/Foo/Baz#new">"new" in Foo::Baz</a>'));
  });
});
