/**
 * One-line template strings that identify a model, configuration and color:
 *
 *   "ASUS TUF Gaming A15 [Ryzen 7 4800H/16GB/RTX 3050/144Hz/512GB SSD] [Graphite Black]"
 */

import type { LaptopConfiguration } from "../catalog/schemas.js";

export type ComponentKind = "cpu" | "ram" | "vga" | "display" | "storage" | "os";

/**
 * Short form of a component name for templates.
 *
 * @example
 * abbreviateComponent("Intel Core i7-12700H (16 CPUs), ~2.3GHz", "cpu") // "i7-12700H"
 * abbreviateComponent("NVIDIA GeForce RTX 4060 8GB", "vga")            // "RTX 4060"
 * abbreviateComponent("15.6-inch FHD (144Hz)", "display")              // "144Hz"
 */
export function abbreviateComponent(fullName: string, kind: ComponentKind): string {
  switch (kind) {
    case "cpu": {
      if (fullName.includes("Intel Core")) {
        return /Intel Core (i\d+-\w+)/.exec(fullName)?.[1] ?? fullName;
      }
      if (fullName.includes("AMD Ryzen")) {
        return /AMD (Ryzen \d+ \w+)/.exec(fullName)?.[1] ?? fullName;
      }
      if (fullName.includes("Apple")) {
        return fullName.replace(" Chip", "");
      }
      return fullName;
    }
    case "vga": {
      const nvidia = /\b(RTX|GTX) (\d+)/.exec(fullName);
      if (nvidia) return `${nvidia[1]} ${nvidia[2]}`;
      if (fullName.includes("Radeon")) {
        return /Radeon\s+(RX\s*\w+)/.exec(fullName)?.[1] ?? fullName;
      }
      return fullName;
    }
    case "display": {
      if (fullName.includes("Hz")) {
        return /(\d+Hz)/.exec(fullName)?.[1] ?? fullName;
      }
      if (fullName.includes("Retina")) return "Retina";
      return fullName;
    }
    default:
      return fullName;
  }
}

export function generateTemplateString(
  modelKey: string,
  config: Pick<LaptopConfiguration, "cpu" | "ram" | "vga" | "display" | "storage">,
  color: string
): string {
  const spec = [
    abbreviateComponent(config.cpu, "cpu"),
    config.ram,
    abbreviateComponent(config.vga, "vga"),
    abbreviateComponent(config.display, "display"),
    config.storage,
  ].join("/");
  return `${modelKey} [${spec}] [${color}]`;
}

export interface TemplateParts {
  model: string;
  /** cpu, ram, vga, display, storage, abbreviated */
  spec: [string, string, string, string, string];
  color: string;
}

/**
 * Split a template into its model, spec and color parts.
 * Undefined when the shape is not `Model [a/b/c/d/e] [Color]`.
 */
export function splitTemplate(template: string): TemplateParts | undefined {
  const match = /^(.+?)\s*\[([^\]]*)\]\s*\[([^\]]*)\]\s*$/.exec(template.trim());
  if (!match) return undefined;

  const parts = match[2].split("/");
  if (parts.length !== 5) return undefined;

  return {
    model: match[1].trim(),
    spec: [parts[0], parts[1], parts[2], parts[3], parts[4]],
    color: match[3],
  };
}
