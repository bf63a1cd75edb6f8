/**
 * Vitest alias configuration for workspace packages.
 *
 * Points each package at its TypeScript sources so tests run without a build.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export type AliasEntry = { find: string; replacement: string };

export const aliases: AliasEntry[] = [
  {
    find: "@docksheet/shared",
    replacement: path.resolve(__dirname, "packages/shared/src/index.ts"),
  },
  {
    find: "@docksheet/motion",
    replacement: path.resolve(__dirname, "packages/motion/src/index.ts"),
  },
  {
    find: "@docksheet/sheet",
    replacement: path.resolve(__dirname, "packages/sheet/src/index.ts"),
  },
];
