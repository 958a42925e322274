/**
 * test/minify.test.ts
 */

import { describe, expect, it } from 'vitest';
import { collapseScriptWhitespace, minifyHtml, stripScriptComments } from '../server/minify.js';

describe('minifyHtml', () => {
  it('removes HTML comments', () => {
    const html = `
    <div>
        <!-- This is a comment -->
        <p>Hello</p>
        <!-- Another comment -->
    </div>
    `;
    expect(minifyHtml(html)).toBe('<div> <p>Hello</p> </div>');
  });

  it('collapses whitespace', () => {
    const html = `
    <div>
        <p>  Hello   World  </p>
    </div>
    `;
    expect(minifyHtml(html)).toBe('<div> <p> Hello World </p> </div>');
  });

  it('removes JS comments but keeps strings and URLs', () => {
    const html = [
      '<script>',
      '    var x = 1; // This is a variable',
      '    var url = "http://example.com"; // URL check',
      '    var protocolRelative = "//cdn.example.com";',
      '    var strWithSlashes = \'path//to//file\';',
      '    var escaped = "foo \\" // bar"; // check escaped quote',
      '    /* block',
      '       comment */ var y = 2;',
      '</script>',
      '<script src="//ajax.googleapis.com/ajax/libs/jquery/3.5.1/jquery.min.js"></script>',
    ].join('\n');

    expect(minifyHtml(html)).toBe(
      [
        '<script>var x = 1;',
        'var url = "http://example.com";',
        'var protocolRelative = "//cdn.example.com";',
        "var strWithSlashes = 'path//to//file';",
        'var escaped = "foo \\" // bar";',
        'var y = 2;</script> <script src="//ajax.googleapis.com/ajax/libs/jquery/3.5.1/jquery.min.js"></script>',
      ].join('\n')
    );
  });

  it('keeps whitespace inside script strings and template literals', () => {
    const html = '<script>\n  alert("a    b");\n  const t = `line1\n\n    indented`;\n</script>';
    expect(minifyHtml(html)).toBe(
      '<script>alert("a    b");\nconst t = `line1\n\n    indented`;</script>'
    );
  });

  it('removes CSS comments', () => {
    const html = `<style>
        body {
            background: #fff; /* White background */
            color: #000;
        }
        /* Block comment
           spanning lines */
        .class { width: 100%; }
    </style>`;
    expect(minifyHtml(html)).toBe(
      '<style>body { background: #fff; color: #000; } .class { width: 100%; }</style>'
    );
  });

  it('leaves text outside scripts alone', () => {
    const html = `
    <p>Visit http://example.com</p>
    <a href="//example.com">Link</a>
    `;
    expect(minifyHtml(html)).toBe('<p>Visit http://example.com</p> <a href="//example.com">Link</a>');
  });

  it('keeps pre and textarea bodies verbatim', () => {
    const html = '<pre>  a\n    b  </pre>\n\n<textarea>\n  <!-- kept -->\n</textarea>';
    expect(minifyHtml(html)).toBe('<pre>  a\n    b  </pre> <textarea>\n  <!-- kept -->\n</textarea>');
  });
});

describe('stripScriptComments', () => {
  it('keeps regex literals that contain slashes', () => {
    expect(stripScriptComments('var re = /\\/\\//g; // tail')).toBe('var re = /\\/\\//g; ');
  });

  it('keeps template literals', () => {
    expect(stripScriptComments('const t = `a // b`; /* c */')).toBe('const t = `a // b`;  ');
  });

  it('treats a slash after a value as division', () => {
    expect(stripScriptComments('var half = total / 2; // note')).toBe('var half = total / 2; ');
  });
});

describe('collapseScriptWhitespace', () => {
  it('turns runs with a line break into one line break', () => {
    expect(collapseScriptWhitespace('  a = 1\n\n\t  b = 2  \n')).toBe('a = 1\nb = 2');
  });

  it('copies regex literals unchanged', () => {
    expect(collapseScriptWhitespace('x = /a   b/g;   y = 1;')).toBe('x = /a   b/g; y = 1;');
  });
});
