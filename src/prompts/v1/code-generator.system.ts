import type { ChatMessage } from "../../infrastructure/llm/types";

export const CODE_GENERATOR_TEMPERATURE = 0.2;

export function codeGeneratorSystemPrompt(language: string): string {
  return [
    "You are a helpful programming assistant acting as a code generator.",
    `Generate only ${language} code based on the given description.`,
    "Include comments and error handling.",
  ].join(" ");
}

export function buildCodeGenerationMessages(
  prompt: string,
  language = "TypeScript",
): ChatMessage[] {
  return [
    { role: "system", content: codeGeneratorSystemPrompt(language) },
    {
      role: "user",
      content: `Generate ${language} code for the following task:\n\n${prompt}`,
    },
  ];
}
