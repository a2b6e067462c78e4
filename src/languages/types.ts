export type LanguageId = "python" | "c" | "cpp" | "java";

/**
 * Argument vector with `{source}`, `{artifact}`, `{dir}` and `{entry}`
 * placeholders. Resolved per request; never passed through a shell.
 */
export type CommandTemplate = readonly string[];

export type TemplateVars = {
  source: string;
  artifact: string;
  dir: string;
  entry: string;
};

export type LanguageProfile = Readonly<{
  language: LanguageId;
  displayName: string;
  extension: string;
  /** File stem for the materialized source; Java needs the public class name. */
  entryName: (source: string) => string;
  compile?: CommandTemplate;
  run: CommandTemplate;
  /** Compiled artifact file name template, relative to the scratch dir. */
  artifact?: string;
}>;

export type LanguageProfileTable = Readonly<Record<LanguageId, LanguageProfile>>;
