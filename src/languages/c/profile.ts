import type { LanguageProfile } from "../types";

export function createCProfile(bin: string): LanguageProfile {
  return {
    language: "c",
    displayName: "C11 (gcc)",
    extension: ".c",
    entryName: () => "main",
    compile: [bin, "-O2", "-std=c11", "-o", "{artifact}", "{source}", "-lm"],
    run: ["{artifact}"],
    artifact: "{entry}",
  };
}
