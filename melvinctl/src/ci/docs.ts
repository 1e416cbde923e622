import fs from "node:fs";
import path from "node:path";

/** Landing page that forwards the site root to the crate's own docs. */
export function redirectPage(docsRoot: string): string {
  const target = `./${docsRoot}/`;
  return [
    "<!DOCTYPE html>",
    "<html>",
    "  <head>",
    `    <meta http-equiv="refresh" content="0; url=${target}">`,
    "    <title>Redirecting...</title>",
    "  </head>",
    "  <body>",
    `    Redirecting to <a href="${target}">${target}</a>`,
    "  </body>",
    "</html>",
    ""
  ].join("\n");
}

export function injectRedirect(docDir: string, docsRoot: string): string {
  if (!fs.existsSync(path.join(docDir, docsRoot))) {
    throw new Error(`Rendered docs have no ${docsRoot}/ directory under ${docDir}`);
  }
  const file = path.join(docDir, "index.html");
  fs.writeFileSync(file, redirectPage(docsRoot), "utf8");
  return file;
}
