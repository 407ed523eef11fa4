import type { Val } from "../eval/values";
import type { DisplaySurfaces, Rendered } from "./types";
import type { Failure } from "../../outcome/failure";
import { prettyPrint, printVal } from "../printer/print";

/** Results longer than this many characters go to the auxiliary surface. */
export const AUXILIARY_THRESHOLD = 100;

export type Formatters = {
  pretty: (v: Val) => string;
  canonical: (v: Val) => string;
};

const DEFAULT_FORMATTERS: Formatters = {
  pretty: (v) => prettyPrint(v),
  canonical: (v) => printVal(v),
};

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Length is counted in characters (code points), not UTF-16 units. */
export function routeText(text: string): Rendered {
  return {
    target: [...text].length > AUXILIARY_THRESHOLD ? "auxiliary" : "inline",
    text,
  };
}

/**
 * Format a value for display. Pretty printing is tried first and the
 * canonical printer is the fallback; if both throw (deeply nested or
 * circular data), an `#<unprintable ...>` placeholder is shown instead.
 */
export function renderValue(value: Val, formatters: Formatters = DEFAULT_FORMATTERS): Rendered {
  let text: string;
  try {
    text = formatters.pretty(value);
  } catch {
    try {
      text = formatters.canonical(value);
    } catch (e) {
      text = `#<unprintable ${value.tag}: ${describe(e)}>`;
    }
  }
  return routeText(text);
}

export function renderFailure(f: Failure): Rendered {
  return routeText(`error: ${f.message}`);
}

export function display(rendered: Rendered, surfaces: DisplaySurfaces): void {
  if (rendered.target === "auxiliary") {
    surfaces.showAuxiliary(rendered.text);
  } else {
    surfaces.showInline(rendered.text);
  }
}
