import { TypeScriptAdapter } from "./typescript.js";
import { JavaAdapter } from "./java.js";
import { GoAdapter } from "./go.js";
import { PythonAdapter } from "./python.js";
import { CAdapter } from "./c.js";
import type { LanguageAdapter } from "./LanguageAdapter.js";

export interface AdapterDescriptor {
  extension: string;
  languageId: string;
  factory: () => LanguageAdapter;
}

export const adapters: AdapterDescriptor[] = [
  {
    extension: ".py",
    languageId: "python",
    factory: () => new PythonAdapter(),
  },
  {
    extension: ".pyi",
    languageId: "python",
    factory: () => new PythonAdapter(),
  },
  {
    extension: ".ts",
    languageId: "typescript",
    factory: () => new TypeScriptAdapter(),
  },
  {
    extension: ".mts",
    languageId: "typescript",
    factory: () => new TypeScriptAdapter(),
  },
  {
    extension: ".cts",
    languageId: "typescript",
    factory: () => new TypeScriptAdapter(),
  },
  {
    extension: ".tsx",
    languageId: "typescript",
    factory: () => new TypeScriptAdapter("typescript", "tsx"),
  },
  {
    extension: ".js",
    languageId: "javascript",
    factory: () => new TypeScriptAdapter("javascript", "tsx"),
  },
  {
    extension: ".jsx",
    languageId: "javascript",
    factory: () => new TypeScriptAdapter("javascript", "tsx"),
  },
  {
    extension: ".mjs",
    languageId: "javascript",
    factory: () => new TypeScriptAdapter("javascript", "tsx"),
  },
  {
    extension: ".cjs",
    languageId: "javascript",
    factory: () => new TypeScriptAdapter("javascript", "tsx"),
  },
  {
    extension: ".go",
    languageId: "go",
    factory: () => new GoAdapter(),
  },
  {
    extension: ".java",
    languageId: "java",
    factory: () => new JavaAdapter(),
  },
  {
    extension: ".c",
    languageId: "c",
    factory: () => new CAdapter(),
  },
  {
    extension: ".h",
    languageId: "c",
    factory: () => new CAdapter(),
  },
];
