/**
 * Recovers a JSON object from free-form model output.
 * Strategies, in order:
 * 1. direct parse
 * 2. fenced code block
 * 3. outermost braces
 * 4. common-mistake repair (trailing commas, undefined/NaN, single quotes)
 */
export interface JsonParseResult {
  data: unknown;
  method: 'direct' | 'codeblock' | 'boundary-object' | 'error-recovery';
}

function sliceObject(text: string): string {
  const firstBrace = text.indexOf('{');
  const lastBrace = text.lastIndexOf('}');
  if (firstBrace === -1 || lastBrace === -1 || firstBrace >= lastBrace) {
    throw new Error('No JSON object boundaries found');
  }
  return text.substring(firstBrace, lastBrace + 1);
}

export function safeJsonParse(text: string): JsonParseResult | null {
  const strategies: Array<() => JsonParseResult> = [
    () => ({ data: JSON.parse(text.trim()), method: 'direct' }),
    () => {
      const codeBlockMatch = text.match(/```(?:json)?\s*([\s\S]*?)```/);
      if (!codeBlockMatch) throw new Error('No code block found');
      return { data: JSON.parse(codeBlockMatch[1].trim()), method: 'codeblock' };
    },
    () => ({ data: JSON.parse(sliceObject(text)), method: 'boundary-object' }),
    () => {
      const fixedText = sliceObject(text.replace(/```(?:json)?/g, ''))
        .replace(/,\s*]/g, ']')
        .replace(/,\s*}/g, '}')
        .replace(/'/g, '"')
        .replace(/:\s*undefined/g, ': null')
        .replace(/:\s*-?Infinity/g, ': null')
        .replace(/:\s*NaN/g, ': null');
      return { data: JSON.parse(fixedText), method: 'error-recovery' };
    },
  ];

  for (const strategy of strategies) {
    try {
      return strategy();
    } catch {
      continue;
    }
  }

  return null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
