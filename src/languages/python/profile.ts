import type { LanguageProfile } from "../types";

export function createPythonProfile(bin: string): LanguageProfile {
  return {
    language: "python",
    displayName: "Python 3",
    extension: ".py",
    entryName: () => "main",
    run: [bin, "{source}"],
  };
}
