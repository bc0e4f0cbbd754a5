import { describe, it, expect } from "vitest";
import { addTargetBlank } from "./add-target-blank";
import { extractLinks } from "./extract-links";
import { outputFilenames } from "./output-filenames";
import { renderMarkdown } from "./render-markdown";
import { cssLinkTag, renderPage, type PageRenderInput } from "./render-page";
import { formatDirectoryStamp, formatTimestamp, padPageNumber } from "./string";
import { getDefaultStyle, loadPageTemplate } from "../templates";

describe("outputFilenames", () => {
  it("links a middle page both ways", () => {
    expect(outputFilenames("page", 2, 3)).toEqual({
      filename: "page-002.html",
      prevPage: "page-001.html",
      nextPage: "page-003.html",
    });
  });

  it("leaves out the previous page of the first page", () => {
    expect(outputFilenames("notes", 1, 3)).toEqual({
      filename: "notes-001.html",
      prevPage: "",
      nextPage: "notes-002.html",
    });
  });

  it("leaves out the next page of the last page", () => {
    expect(outputFilenames("page", 3, 3).nextPage).toBe("");
  });

  it("gives a single page no neighbours", () => {
    expect(outputFilenames("page", 1, 1)).toEqual({
      filename: "page-001.html",
      prevPage: "",
      nextPage: "",
    });
  });
});

describe("string helpers", () => {
  it("pads page numbers to three digits", () => {
    expect(padPageNumber(7)).toBe("007");
    expect(padPageNumber(1234)).toBe("1234");
  });

  it("formats local timestamps", () => {
    const date = new Date(2024, 0, 2, 3, 4, 5);
    expect(formatTimestamp(date)).toBe("2024-01-02 03:04");
    expect(formatDirectoryStamp(date)).toBe("20240102_030405");
  });
});

describe("addTargetBlank", () => {
  it("opens external links in a new tab", () => {
    expect(addTargetBlank('<a href="https://example.com">x</a>')).toBe(
      '<a target="_blank" href="https://example.com">x</a>',
    );
  });

  it("leaves relative links and other attribute orders alone", () => {
    const html = '<a href="page-002.html">next</a> <a class="x" href="http://a">a</a>';
    expect(addTargetBlank(html)).toBe(html);
  });
});

describe("renderMarkdown", () => {
  it("renders fenced code with its language class", () => {
    expect(renderMarkdown("```python\nx = 1\n```\n")).toBe(
      '<pre><code class="language-python">x = 1\n</code></pre>\n',
    );
  });

  it("passes raw HTML through", () => {
    expect(renderMarkdown('<p style="color: red;">x</p>\n')).toBe(
      '<p style="color: red;">x</p>\n',
    );
  });
});

describe("extractLinks", () => {
  it("keeps the first heading and every anchor line", () => {
    const html =
      '<h1>Test</h1>\n<p>Intro</p>\n<h2>More</h2>\n<p><a href="https://a">A</a></p>\n';
    expect(extractLinks(html)).toBe(
      '<h1>Test</h1>\n<p><a href="https://a">A</a></p>',
    );
  });

  it("keeps an h1 page without links", () => {
    expect(extractLinks("<h1>T</h1>\n<p>text</p>\n")).toBe("<h1>T</h1>");
  });

  it("skips a page with neither an h1 nor links", () => {
    expect(extractLinks("<h2>Sub</h2>\n<p>No links</p>\n")).toBeNull();
  });

  it("keeps a lower first heading when the page has links", () => {
    const html = "<h2>A</h2>\n<h1>B</h1>\n<p><a href='y'>y</a></p>\n";
    expect(extractLinks(html)).toBe("<h2>A</h2>\n<p><a href='y'>y</a></p>");
  });

  it("lists a heading that is also a link once", () => {
    expect(extractLinks('<h1><a href="#x">T</a></h1>\n')).toBe(
      '<h1><a href="#x">T</a></h1>',
    );
  });
});

describe("renderPage", () => {
  const input = (overrides: Partial<PageRenderInput> = {}): PageRenderInput => ({
    number: 1,
    title: "Q&A",
    body: "<h1>Q&amp;A</h1>\n",
    prevPage: "",
    nextPage: "page-002.html",
    cssLink: "",
    customCss: "custom.css",
    classes: "",
    ...overrides,
  });

  it("fills the page template", async () => {
    const html = renderPage(await loadPageTemplate(null), input());

    expect(html).toContain("<title>1. Q&amp;A</title>");
    expect(html).toContain('<div id="container" class="page-001">');
    expect(html).toContain('<div id="content">\n<h1>Q&amp;A</h1>\n');
    expect(html).toContain('<a href="page-002.html">&rarr;</a>');
    expect(html).not.toContain("&larr;</a>");
    expect(html).toContain("let prevPage = '';");
    expect(html).toContain("let nextPage = 'page-002.html';");
    expect(html).toContain(
      '<link rel="stylesheet" type="text/css" href="custom.css">',
    );
  });

  it("embeds the default style without a CSS file", async () => {
    const html = renderPage(await loadPageTemplate(null), input());
    expect(html).toContain(`<style>\n${getDefaultStyle()}</style>`);
  });

  it("links the CSS file instead of embedding the style", async () => {
    const html = renderPage(
      await loadPageTemplate(null),
      input({ cssLink: cssLinkTag("style.css") }),
    );

    expect(html).toContain(
      '<link rel="stylesheet" type="text/css" href="style.css">',
    );
    expect(html).not.toContain("<style>");
  });

  it("adds directive classes to the content div", async () => {
    const html = renderPage(
      await loadPageTemplate(null),
      input({ number: 2, prevPage: "page-001.html", classes: "wide dark" }),
    );

    expect(html).toContain('<div id="content" class="wide dark">');
    expect(html).toContain('<a href="page-001.html">&larr;</a>');
  });
});
