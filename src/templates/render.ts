/**
 * render.ts - Rendering profile templates into deployment files
 *
 * Templates are Handlebars files stored next to each profile.yaml. Every
 * template renders to one output file named after the template's basename,
 * so "profiles/sriov-ethernet-rdma/sriov-policy.yaml" becomes
 * "sriov-policy.yaml" in the output map.
 *
 * Rendering settings:
 * - strict: referencing a field the view doesn't have is an error, so a
 *   missing config value fails loudly instead of producing an empty YAML key
 * - noEscape: output is YAML and Markdown, not HTML
 *
 * The engine is an isolated Handlebars instance; helpers registered here
 * don't leak into other users of the library.
 */

import * as fs from "fs";
import * as path from "path";
import Handlebars from "handlebars";
import { errorMessage } from "../errors";

const engine = Handlebars.create();

/** {{#if (eq requirements.fabric "infiniband")}} */
engine.registerHelper("eq", (left: unknown, right: unknown) => left === right);

/** {{join workerNodes ", "}} */
engine.registerHelper("join", (items: unknown, separator: unknown) =>
  Array.isArray(items) ? items.map(String).join(typeof separator === "string" ? separator : ",") : ""
);

/**
 * Renders one template source against a view.
 *
 * @param source - Template text
 * @param view - Values the template may reference
 * @param name - Template name for error messages
 * @throws Error naming the template when compilation or rendering fails
 */
export function renderTemplate(source: string, view: object, name: string): string {
  try {
    const template = engine.compile(source, { strict: true, noEscape: true });
    return template(view);
  } catch (error) {
    throw new Error(`failed to render template ${name}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Reads and renders a list of template files.
 *
 * @param templatePaths - Absolute template paths
 * @param view - Values the templates may reference
 * @returns Output file name → rendered content, in template order
 * @throws Error when a template can't be read or rendered, or two templates
 *   share a basename
 */
export async function renderTemplates(
  templatePaths: string[],
  view: object
): Promise<Record<string, string>> {
  const rendered: Record<string, string> = {};

  for (const templatePath of templatePaths) {
    const fileName = path.basename(templatePath);
    if (fileName in rendered) {
      throw new Error(`duplicate output file name ${fileName} (from ${templatePath})`);
    }

    let source: string;
    try {
      source = await fs.promises.readFile(templatePath, "utf8");
    } catch (error) {
      throw new Error(`failed to read template ${templatePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    rendered[fileName] = renderTemplate(source, view, templatePath);
  }

  return rendered;
}
