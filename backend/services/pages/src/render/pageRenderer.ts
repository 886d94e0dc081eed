// backend/services/pages/src/render/pageRenderer.ts
import fs from "node:fs";
import Handlebars from "handlebars";

export interface PageView {
  pageTitle: string;
  pageSchemaApi: string;
  getConfigAddr: string;
}

const SCRIPT_UNSAFE: Record<string, string> = {
  "<": "\\u003c",
  ">": "\\u003e",
  "&": "\\u0026",
  "\u2028": "\\u2028",
  "\u2029": "\\u2029",
};

/** A JS string literal that can sit inside an inline `<script>` block. */
export function jsStringLiteral(value: string): string {
  return JSON.stringify(value).replace(
    /[<>&\u2028\u2029]/g,
    (c) => SCRIPT_UNSAFE[c] ?? c
  );
}

/** HTML shell that loads a page's schema from the config API in the browser. */
export class PageRenderer {
  private readonly template: Handlebars.TemplateDelegate<PageView>;

  constructor(source: string) {
    const hbs = Handlebars.create();
    // HTML escaping is wrong inside <script>: browsers do not decode entities there.
    hbs.registerHelper(
      "jsString",
      (value: unknown) => new hbs.SafeString(jsStringLiteral(String(value)))
    );
    this.template = hbs.compile<PageView>(source, { strict: true });
  }

  static fromFile(file: string): PageRenderer {
    return new PageRenderer(fs.readFileSync(file, "utf8"));
  }

  static viewFor(name: string): PageView {
    const configAddr = `/config/get/${encodeURIComponent(name)}`;
    return {
      pageTitle: name,
      pageSchemaApi: `GET:${configAddr}`,
      getConfigAddr: configAddr,
    };
  }

  render(name: string): string {
    return this.template(PageRenderer.viewFor(name));
  }
}
