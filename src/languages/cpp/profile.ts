import type { LanguageProfile } from "../types";

export function createCppProfile(bin: string): LanguageProfile {
  return {
    language: "cpp",
    displayName: "C++17 (g++)",
    extension: ".cpp",
    entryName: () => "main",
    compile: [bin, "-O2", "-std=c++17", "-o", "{artifact}", "{source}"],
    run: ["{artifact}"],
    artifact: "{entry}",
  };
}
