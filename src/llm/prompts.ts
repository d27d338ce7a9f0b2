import type { ReviewUnit } from "../review/types.js";
import { REVIEW_CATEGORIES } from "../review/types.js";
import type { UnitChunk } from "./chunker.js";

/**
 * System prompt for the per-chunk review. The response grammar described
 * here is what `parseAiResponse` accepts; keep the two in step.
 */
export function buildSystemPrompt(customInstructions?: string): string {
  let prompt = `You are an expert code reviewer. You review one source file (or one chunk of it) at a time.

## What to Assess
1. **Bugs & correctness**: logic errors, off-by-one, null safety, unhandled edge cases.
2. **Security**: injection, unsafe deserialization, hardcoded secrets, missing validation.
3. **Semantics**: code that does not do what its names and comments say.
4. **Best practices**: idioms and conventions of the language, maintainability.
5. **Style**: only where it hurts readability.

## Guidelines
- Reference the line numbers shown in the left margin; they are the file's real line numbers.
- Be concise and specific. Explain why something is a problem.
- Only report issues that matter. Prefer fewer, higher-quality findings.
- Severity levels: "error" = must fix, "warning" = should fix, "info" = suggestion.

## Output Format
Respond with exactly one JSON object inside a \`\`\`json code block and nothing else:
{
  "findings": [
    {
      "line": 42,
      "endLine": 44,
      "severity": "warning",
      "category": "${REVIEW_CATEGORIES.join("|")}",
      "message": "Clear description of the issue",
      "fix": "optional replacement code for the flagged lines"
    }
  ],
  "assessment": "Two or three sentences on the overall quality of this code.",
  "score": 7
}

Field details:
- "endLine" and "fix" are optional.
- "score": 1-10, where 10 is production-ready code.
- If there are no issues, return an empty "findings" array.`;

  if (customInstructions) {
    prompt += `\n\n## Additional Instructions\n${customInstructions}`;
  }
  return prompt;
}

export function buildUserPrompt(unit: ReviewUnit, chunk: UnitChunk): string {
  const width = String(chunk.endLine).length;
  const numbered = chunk.lines
    .map((line, i) => `${String(chunk.startLine + i).padStart(width)} | ${line}`)
    .join("\n");

  const scope =
    chunk.total > 1
      ? `Chunk ${chunk.index + 1} of ${chunk.total} (lines ${chunk.startLine}-${chunk.endLine}).`
      : `Whole file (${unit.lines.length} lines).`;

  return `Review the following ${unit.language} code.

File: ${unit.path}
${scope}

\`\`\`${unit.language}
${numbered}
\`\`\``;
}
