import type { ToolchainConfig } from "../config";
import { InvalidLanguageError } from "../judge/errors";
import { createCProfile } from "./c/profile";
import { createCppProfile } from "./cpp/profile";
import { createJavaProfile } from "./java/profile";
import { createPythonProfile } from "./python/profile";
import type {
  CommandTemplate,
  LanguageId,
  LanguageProfile,
  LanguageProfileTable,
  TemplateVars,
} from "./types";

export const DEFAULT_TOOLCHAIN: ToolchainConfig = {
  python: "python3",
  gcc: "gcc",
  gxx: "g++",
  javac: "javac",
  java: "java",
};

export function buildLanguageProfiles(toolchain: ToolchainConfig = DEFAULT_TOOLCHAIN): LanguageProfileTable {
  const table: Record<LanguageId, LanguageProfile> = {
    python: createPythonProfile(toolchain.python),
    c: createCProfile(toolchain.gcc),
    cpp: createCppProfile(toolchain.gxx),
    java: createJavaProfile(toolchain.javac, toolchain.java),
  };
  for (const profile of Object.values(table)) Object.freeze(profile);
  return Object.freeze(table);
}

export const LANGUAGE_PROFILES: LanguageProfileTable = buildLanguageProfiles();

export function isSupportedLanguage(
  language: string,
  table: LanguageProfileTable = LANGUAGE_PROFILES
): language is LanguageId {
  return Object.prototype.hasOwnProperty.call(table, language);
}

export function listLanguages(table: LanguageProfileTable = LANGUAGE_PROFILES): LanguageId[] {
  return Object.values(table).map((p) => p.language);
}

export function getLanguageProfile(
  language: string,
  table: LanguageProfileTable = LANGUAGE_PROFILES
): LanguageProfile {
  if (!isSupportedLanguage(language, table)) {
    throw new InvalidLanguageError(language, listLanguages(table));
  }
  return table[language];
}

const PLACEHOLDER = /\{(source|artifact|dir|entry)\}/g;

export function resolveTemplate(template: CommandTemplate, vars: TemplateVars): string[] {
  return template.map((arg) =>
    arg.replace(PLACEHOLDER, (_match: string, key: keyof TemplateVars) => vars[key])
  );
}
