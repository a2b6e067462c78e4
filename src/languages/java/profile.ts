import type { LanguageProfile } from "../types";
import { inferJavaEntryName } from "./entry";

export function createJavaProfile(javac: string, java: string): LanguageProfile {
  return {
    language: "java",
    displayName: "Java",
    extension: ".java",
    entryName: (source) => inferJavaEntryName(source),
    compile: [javac, "-encoding", "UTF-8", "-d", "{dir}", "{source}"],
    run: [java, "-cp", "{dir}", "{entry}"],
    artifact: "{entry}.class",
  };
}
