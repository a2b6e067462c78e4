import { z } from "zod";

export const MAX_CODE_LENGTH = 200_000;
export const MAX_STDIN_LENGTH = 50_000;
export const MAX_TEST_CASES = 50;

const CodeSchema = z.string().max(MAX_CODE_LENGTH, `code exceeds maximum length of ${MAX_CODE_LENGTH} characters.`);
const StdinSchema = z.string().max(MAX_STDIN_LENGTH, `stdin exceeds maximum length of ${MAX_STDIN_LENGTH} characters.`);

export const AnalyzeRequestSchema = z.object({
  code: CodeSchema,
  // Ids the registry does not know, blanks included, are ignored by the analyzer.
  rules: z.array(z.string().trim()).nullish(),
});

export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;

export function createExecutionSchemas(maxTimeoutMs: number) {
  const TimeoutSchema = z.number().int().positive().max(maxTimeoutMs);
  const LanguageSchema = z.string().trim().toLowerCase().min(1);

  const RunRequestSchema = z.object({
    code: CodeSchema.refine((s) => s.trim().length > 0, "code must be a non-empty string."),
    language: LanguageSchema,
    stdin: StdinSchema.optional(),
    expected_output: StdinSchema.nullish(),
    timeout_ms: TimeoutSchema.optional(),
  });

  const TestCaseSchema = z.object({
    input: StdinSchema.default(""),
    expected_output: StdinSchema,
  });

  const TestRequestSchema = z.object({
    code: CodeSchema.refine((s) => s.trim().length > 0, "code must be a non-empty string."),
    language: LanguageSchema,
    test_cases: z.array(TestCaseSchema).min(1).max(MAX_TEST_CASES),
    timeout_ms: TimeoutSchema.optional(),
  });

  return { RunRequestSchema, TestRequestSchema };
}

export type ExecutionSchemas = ReturnType<typeof createExecutionSchemas>;
export type RunRequest = z.infer<ExecutionSchemas["RunRequestSchema"]>;
export type TestRequest = z.infer<ExecutionSchemas["TestRequestSchema"]>;

export function describeZodError(error: z.ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}
