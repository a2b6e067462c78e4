const JAVA_IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function stripJavaComments(source: string): string {
  const withoutBlockComments = source.replace(/\/\*[\s\S]*?\*\//g, "");
  return withoutBlockComments.replace(/\/\/.*$/gm, "");
}

/**
 * javac insists that a public class lives in a file of the same name, so the
 * entry point is the public class when there is one, then the first class,
 * then "Main".
 */
export function inferJavaEntryName(source: string, fallback = "Main"): string {
  const s = stripJavaComments(source);
  const publicMatch = s.match(/\bpublic\s+(?:(?:final|abstract)\s+)*class\s+([A-Za-z_$][A-Za-z0-9_$]*)/);
  const anyMatch = s.match(/\bclass\s+([A-Za-z_$][A-Za-z0-9_$]*)/);
  const name = publicMatch?.[1] ?? anyMatch?.[1];
  return name && JAVA_IDENTIFIER.test(name) ? name : fallback;
}
