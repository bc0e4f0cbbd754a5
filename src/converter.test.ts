import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Converter, type PipelineStep } from "./converter";
import { getDefaultStyle } from "./templates";
import { loadDefaultConfig } from "./utils/load-config";
import { Logger } from "./utils/logger";
import { Tracker } from "./utils/tracker";
import type { ConversionContext, SplitOptions } from "./types";

const DOCUMENT = `<!-- title: Welcome -->
# Test

See [Docs](https://example.com/docs).

---
## Code

<!-- code-file: hello.py -->
\`\`\`python
print("Hello from Python.")
\`\`\`

---
<!-- no-pub -->
# Draft

---
<!-- class: wide -->
### Third
`;

const CODE_IMAGE = "codeimg_hello.49c18460.png";

describe("Converter", () => {
  let root: string;
  let outputDir: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "marksplit-run-"));
    outputDir = join(root, "out");
    await mkdir(outputDir);
    await writeFile(join(root, "talk.md"), DOCUMENT);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function createContext(
    overrides: Partial<SplitOptions> = {},
  ): Promise<ConversionContext> {
    return {
      config: await loadDefaultConfig(),
      options: {
        sourcePath: join(root, "talk.md"),
        outputDir,
        outputName: "page",
        imagesSubdir: null,
        imagesDir: null,
        codeSubdir: null,
        codeDir: null,
        cssPath: null,
        imageDelay: 0,
        templatesDir: root,
        ...overrides,
      },
      runDate: new Date(2024, 0, 2, 3, 4, 5),
      tracker: new Tracker(),
      logger: new Logger("error"),
    };
  }

  const read = (name: string) => readFile(join(outputDir, name), "utf-8");

  async function withCodeDirs(): Promise<Partial<SplitOptions>> {
    await mkdir(join(root, "images"));
    await mkdir(join(root, "code_files"));
    return {
      imagesSubdir: "images",
      imagesDir: join(root, "images"),
      codeSubdir: "code_files",
      codeDir: join(root, "code_files"),
    };
  }

  it("runs the pipeline steps in order", async () => {
    const steps: PipelineStep[] = [];
    await new Converter(await createContext(), (step) => steps.push(step)).run();

    expect(steps).toEqual(["split", "styles", "process", "images", "index"]);
  });

  it("writes one file per published page plus the index pages", async () => {
    const stats = await new Converter(await createContext()).run();

    expect((await readdir(outputDir)).sort()).toEqual([
      "index.html",
      "links.html",
      "one-page.html",
      "page-001.html",
      "page-002.html",
      "page-003.html",
    ]);
    expect(stats.totalPages).toBe(3);
    expect(stats.writtenPages).toBe(3);
    expect(stats.skippedPages).toBe(1);
    expect(stats.createdIndexes).toBe(3);
  });

  it("lists pages in the index by title and heading level", async () => {
    await new Converter(await createContext()).run();
    const index = await read("index.html");

    expect(index).toContain(
      '  <li class="index-lev-1"><a href="page-001.html">Welcome</a></li>\n' +
        '  <li class="index-lev-2"><a href="page-002.html">Code</a></li>\n' +
        '  <li class="index-lev-3"><a href="page-003.html">Third</a></li>\n',
    );
    expect(index).not.toContain("Draft");
    expect(index).toContain("Created by marksplit v0.1.0 at 2024-01-02 03:04");
  });

  it("applies directives and navigation to page files", async () => {
    await new Converter(await createContext()).run();

    const first = await read("page-001.html");
    expect(first).toContain("<title>1. Welcome</title>");
    expect(first).not.toContain("title: Welcome");
    expect(first).toContain(
      '<p>See <a target="_blank" href="https://example.com/docs">Docs</a>.</p>',
    );
    expect(first).toContain('<a href="page-002.html">&rarr;</a>');

    const last = await read("page-003.html");
    expect(last).toContain('<div id="content" class="wide">');
    expect(last).toContain('<a href="page-002.html">&larr;</a>');
    expect(last).toContain("let nextPage = '';");
  });

  it("renders code blocks in place without code and images directories", async () => {
    await new Converter(await createContext()).run();
    const page = await read("page-002.html");

    expect(page).toContain(
      '<pre><code class="language-python">print(&quot;Hello from Python.&quot;)\n</code></pre>',
    );
    expect(page).not.toContain("code-file");
  });

  it("replaces extracted code with its image", async () => {
    const dirs = await withCodeDirs();
    await writeFile(join(root, "images", CODE_IMAGE), "png");
    await writeFile(join(root, "images", "photo.jpg"), "jpg");

    const stats = await new Converter(await createContext(dirs)).run();
    const page = await read("page-002.html");

    expect(page).toContain(`<img src="images/${CODE_IMAGE}" alt="hello.py">`);
    expect(page).not.toContain("<pre>");
    expect(
      await readFile(join(root, "code_files", "hello.49c18460.py"), "utf-8"),
    ).toBe('print("Hello from Python.")\n');
    expect((await readdir(join(outputDir, "images"))).sort()).toEqual([
      CODE_IMAGE,
      "photo.jpg",
    ]);
    expect(stats.copiedImages).toBe(2);
    expect(stats.foundCodeImages).toBe(1);
  });

  it("warns about a code image that has not been produced", async () => {
    const ctx = await createContext(await withCodeDirs());
    await new Converter(ctx).run();

    expect(await read("page-002.html")).toContain(
      `<p style="color: red;">No code image for 'hello.49c18460.py'</p>`,
    );
    expect(ctx.tracker.getWarnings()).toEqual([
      "WARNING: No code image for 'hello.49c18460.py'",
    ]);
  });

  it("collects headings and links on the links page", async () => {
    await new Converter(await createContext()).run();
    const links = await read("links.html");

    expect(links).toContain(
      '<h1>Test</h1>\n<p>See <a target="_blank" href="https://example.com/docs">Docs</a>.</p>\n<p>&nbsp;</p>',
    );
    expect(links).not.toContain("<h2>Code</h2>");
  });

  it("puts every page body on the one-page version", async () => {
    await new Converter(await createContext()).run();
    const onePage = await read("one-page.html");

    expect(onePage).toContain("<h1>Test</h1>");
    expect(onePage).toContain("<h2>Code</h2>");
    expect(onePage).toContain("<h3>Third</h3>");
    expect(onePage).not.toContain("Draft");
  });

  it("seeds the CSS file and links it from every page", async () => {
    await new Converter(
      await createContext({ cssPath: join(outputDir, "style.css") }),
    ).run();

    expect(await read("style.css")).toBe(getDefaultStyle());
    const page = await read("page-001.html");
    expect(page).toContain(
      '<link rel="stylesheet" type="text/css" href="style.css">',
    );
    expect(page).not.toContain("<style>");
  });

  it("keeps an existing CSS file", async () => {
    await writeFile(join(outputDir, "style.css"), "body { color: red; }\n");

    await new Converter(
      await createContext({ cssPath: join(outputDir, "style.css") }),
    ).run();

    expect(await read("style.css")).toBe("body { color: red; }\n");
  });

  it("uses a page template placed beside the document", async () => {
    await writeFile(
      join(root, "page.html.hbs"),
      "<main>{{title}}|{{nextPage}}</main>\n",
    );

    await new Converter(await createContext()).run();

    expect(await read("page-001.html")).toBe(
      "<main>1. Welcome|page-002.html</main>\n",
    );
  });

  it("writes nothing for a document without pages", async () => {
    await writeFile(join(root, "talk.md"), "---\n---\n");

    const stats = await new Converter(
      await createContext({ cssPath: join(outputDir, "style.css") }),
    ).run();

    expect(await readdir(outputDir)).toEqual([]);
    expect(stats.totalPages).toBe(0);
  });
});
