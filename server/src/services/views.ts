import Handlebars from "handlebars";
import { existsSync, readdirSync, readFileSync } from "fs";
import { basename, join } from "path";
import { gravatarUrl } from "../utils/gravatar.js";
import { formatTimestamp } from "../utils/dates.js";

const TEMPLATE_EXT = ".hbs";

export type ViewData = Record<string, unknown>;

export interface ViewRenderer {
  render(view: string, data: ViewData): string;
}

function listTemplates(dir: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir).filter((f) => f.endsWith(TEMPLATE_EXT));
}

function registerHelpers(hbs: typeof Handlebars): void {
  hbs.registerHelper("gravatar", (email: unknown) =>
    typeof email === "string" ? gravatarUrl(email) : "",
  );
  hbs.registerHelper("timestamp", (value: unknown) =>
    typeof value === "string" ? formatTimestamp(value) : "",
  );
}

/**
 * Compile every page template in `dir` (and register `dir/partials` as partials) once.
 * Templates are looked up by file name without the extension.
 */
export function loadViews(dir: string): ViewRenderer {
  const hbs = Handlebars.create();
  registerHelpers(hbs);

  const partialsDir = join(dir, "partials");
  for (const file of listTemplates(partialsDir)) {
    hbs.registerPartial(
      basename(file, TEMPLATE_EXT),
      readFileSync(join(partialsDir, file), "utf-8"),
    );
  }

  const templates = new Map<string, (context: ViewData) => string>();
  for (const file of listTemplates(dir)) {
    const source = readFileSync(join(dir, file), "utf-8");
    templates.set(basename(file, TEMPLATE_EXT), hbs.compile(source));
  }
  if (templates.size === 0) {
    throw new Error(`No templates found in ${dir}`);
  }

  return {
    render(view, data) {
      const template = templates.get(view);
      if (!template) throw new Error(`Unknown view: ${view}`);
      return template(data);
    },
  };
}
