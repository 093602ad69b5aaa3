import { PipelineError } from "@/lib/errors";
import { TextGenerator } from "@/lib/gemini";

export const SUPPORTED_LANGUAGES = [
  "English",
  "Hindi",
  "Bengali",
  "Telugu",
  "Marathi",
  "Tamil",
  "Urdu",
  "Gujarati",
  "Kannada",
  "Malayalam",
  "Punjabi"
] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

export function buildTranslationPrompt(text: string, language: SupportedLanguage): string {
  return `Translate the following directions from English to ${language}.
Keep the line breaks, numbering and structure of the original.
Keep numbers, distances, place names and road names unchanged.
Reply with the translation only.

${text}`;
}

export class Translator {
  constructor(private readonly generator: TextGenerator) {}

  async translate(text: string, language: SupportedLanguage, signal?: AbortSignal): Promise<string> {
    if (language === "English" || !text.trim()) {
      return text;
    }

    const translated = (await this.generator.generate([{ text: buildTranslationPrompt(text, language) }], { temperature: 0.2, signal })).trim();
    if (!translated) {
      throw new PipelineError("TranslationFailed", `The AI service returned no ${language} translation.`);
    }

    return translated;
  }
}
