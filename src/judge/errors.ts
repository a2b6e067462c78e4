export class InvalidLanguageError extends Error {
  language: string;
  supported: string[];

  constructor(language: string, supported: string[]) {
    super(`Unsupported language: ${language}. Supported: ${supported.join(", ")}`);
    this.name = "InvalidLanguageError";
    this.language = language;
    this.supported = supported;
  }
}
