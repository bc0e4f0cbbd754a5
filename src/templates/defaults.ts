/**
 * Built-in default templates
 * These are used when no user templates are provided
 */

/**
 * Default stylesheet, embedded in every page unless a CSS file is given
 * (the CSS file is then seeded with this text)
 */
export function getDefaultStyle(): string {
  return `body { font-family: sans-serif; }

h1 {
    color: #004578;
    text-align: center;
}

h2 {
    color: #002452;
    margin-top: 2rem;
}

h3 { color: #001541; }

img {
    border: 1px solid #dde;
    border-radius: 6px;
    height: auto;
    max-width: 80%;
}

li { margin-top: 0.8rem; }

blockquote {
    border: 1px solid #b0e0e6;
    border-radius: 6px;
    color: darkslategray;
    padding: 0px 4px;
}

code {
    background-color: #eee;
    padding-left: 0.3rem;
    padding-right: 0.3rem;
    font-family: monospace;
}

#container {
    margin: 0.3rem;
    display: flex;
    align-items: center;
    justify-content: center;
    min-height: 600px;
}

#content {
    border: 1px solid silver;
    padding: 2rem 10%;
    width: 900px;
    max-width: 90%;
}

.text-center { text-align: center; }

.nav-link {
    padding-top: 2rem;
    width: 3rem;
}

.nav-link a {
    border: 1px solid silver;
    border-radius: 5px;
    font-size: 20px;
    font-weight: bold;
    margin: 0.5rem;
    padding: 0.5rem;
}

#nav-prev, #nav-next { visibility: hidden; }

#container.show-nav #nav-prev { visibility: visible; }

#container.show-nav #nav-next { visibility: visible; }

a:link, a:visited {
    color: navy;
    text-decoration: none;
}

a:hover { text-decoration: underline; }
`;
}

/**
 * Keyboard (arrows, Page Up/Down) and swipe navigation between pages
 */
const NAV_SCRIPT = `<script type="text/javascript">
    let startX = 0;
    let startY = 0;
    let endX = 0;
    let endY = 0;
    let prevPage = '{{prevPage}}';
    let nextPage = '{{nextPage}}';
    const MIN_SWIPE = 30;

    document.addEventListener('keydown', function(event) {
        switch (event.key) {
            case "ArrowLeft":
            case "PageUp":
                if (prevPage) { window.location.href = prevPage; }
                break;
            case "ArrowRight":
            case "PageDown":
                if (nextPage) { window.location.href = nextPage; }
                break;
            default:
                break;
        }
    });

    document.addEventListener('touchstart', (event) => {
        startX = event.changedTouches[0].screenX;
        startY = event.changedTouches[0].screenY;
    }, false);

    document.addEventListener('touchend', (event) => {
        endX = event.changedTouches[0].screenX;
        endY = event.changedTouches[0].screenY;
        handleSwipe();
    }, false);

    function handleSwipe() {
        let diffX = endX - startX;
        let diffY = endY - startY;
        let diff = Math.abs(diffX) > Math.abs(diffY) ? diffX : diffY;

        if (Math.abs(diff) > MIN_SWIPE) {
            if (diff > 0) {  // Swipe right or down
                if (prevPage) { window.location.href = prevPage; }
            } else {  // Swipe left or up
                if (nextPage) { window.location.href = nextPage; }
            }
        }
    }
</script>`;

/**
 * Shows the navigation links while the mouse moves, hides them 2s later
 */
const SHOW_HIDE_SCRIPT = `<script type="text/javascript">
    var containerDiv = document.getElementById('container');
    var timeoutId;
    document.addEventListener('mousemove', function() {
        containerDiv.classList.add('show-nav');
        if (timeoutId) {
            clearTimeout(timeoutId);
        }
        timeoutId = setTimeout(function() {
            containerDiv.classList.remove('show-nav');
        }, 2000);
    });
</script>`;

const FOOT_STYLE = `    #foot {
        border-top: 1px solid gray;
        font-family: monospace;
        font-size: small;
        margin-top: 3rem;
        padding-top: 1rem;
    }`;

const SEPARATOR = `<p>&nbsp;</p>
<hr>
<p>&nbsp;</p>`;

/**
 * Generate default page template
 * A navigation link is left out when its target is empty
 */
export function getDefaultPageTemplate(): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<title>{{title}}</title>
<meta http-equiv="Content-Type" content="text/html; charset=UTF-8">
{{#if cssLink}}
{{{cssLink}}}
{{else}}
<style>
{{{defaultStyle}}}</style>
{{/if}}
<link rel="stylesheet" type="text/css" href="{{customCss}}">
</head>
<body>
<div id="container" class="{{pageClass}}">

<div id="nav-prev" class="nav-link">
{{#if prevPage}}
  <a href="{{prevPage}}">&larr;</a>
{{/if}}
</div>

<div id="content"{{#if classes}} class="{{classes}}"{{/if}}>
{{{content}}}
</div>  <!-- content -->

<div id="nav-next" class="nav-link">
{{#if nextPage}}
  <a href="{{nextPage}}">&rarr;</a>
{{/if}}
</div>

</div>  <!-- container -->

${NAV_SCRIPT}

${SHOW_HIDE_SCRIPT}

</body>
</html>
`;
}

/**
 * Generate default index template
 * One entry per page, classed by heading level
 */
export function getDefaultIndexTemplate(): string {
  return `<!DOCTYPE html>
<html lang='en'>
<head>
  <title>Index</title>
  <style>
    body { font-family: sans-serif; }
    li {
        border: 1px solid #dde;
        border-radius: 5px;
        margin: 0.3rem;
        padding: 0.3rem;
    }
    #container { display: flex; justify-content: center; }
    #content { max-width: 900px; }
${FOOT_STYLE}
    a:link, a:visited { color: navy; text-decoration: none; }
    a:hover { text-decoration: underline; }
  </style>
  <link rel="stylesheet" type="text/css" href="{{customCss}}">
  <base target="_blank">
</head>
<body>
<div id="container">
<div id="content">
<p>
Navigate pages using Left and Right arrow, Page Up, and Page Down.</p>
<p>See also:
<a href="links.html">Extracted links</a>,
<a href="one-page.html">One-page version</a>
</p>
<h1>Index of Pages</h1>
<ol>
{{#each entries}}
  <li class="index-lev-{{level}}"><a href="{{filename}}">{{title}}</a></li>
{{/each}}
</ol>
<div id="foot">
Created by {{appName}} v{{version}} at {{created}}
</div>
</div>
</div>
</body>
</html>
`;
}

/**
 * Generate default one-page template
 * Every page body in order, separated by a rule
 */
export function getDefaultOnePageTemplate(): string {
  return `<!DOCTYPE html>
<html lang='en'>
<head>
  <title>One-Page</title>
  <style>
    body {
        font-family: sans-serif;
        margin: 4rem;
    }
${FOOT_STYLE}
  </style>
</head>
<body>
{{#each pages}}
{{{this}}}
${SEPARATOR}
{{/each}}
<div id="foot">Created by {{appName}} v{{version}} at {{created}}</div>
</body>
</html>
`;
}

/**
 * Generate default links template
 * Headings and anchor lines extracted from each page
 */
export function getDefaultLinksTemplate(): string {
  return `<!DOCTYPE html>
<html lang='en'>
<head>
  <title>Extracted Links</title>
  <style>
    body {
        font-family: sans-serif;
        margin: 4rem;
    }
${FOOT_STYLE}
  </style>
</head>
<body>
{{#each sections}}
{{{this}}}
${SEPARATOR}
{{/each}}
<div id="foot">Created by {{appName}} v{{version}} at {{created}}</div>
</body>
</html>
`;
}
