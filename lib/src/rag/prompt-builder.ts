/**
 * Prompt Builder
 *
 * Assembles the grounded prompt (instructions, context block, question, cue)
 * or the fallback prompt when no passage carries text. Pure and deterministic.
 *
 * Passage text and the question are joined by concatenation only, never by
 * placeholder substitution, so passage content cannot inject template markers.
 */

import {
  DEFAULT_PROMPT_TEMPLATE,
  PromptTemplateSchema,
  SOURCE_CONTEXT_SEPARATOR,
  type PromptBundle,
  type PromptTemplate,
  type RetrievedPassage,
} from './types.js';

export class PromptBuilder {
  private readonly template: PromptTemplate;

  /**
   * @throws {ZodError} When an override leaves the template incomplete, e.g. an empty answer cue
   */
  constructor(template?: Partial<PromptTemplate>) {
    this.template = PromptTemplateSchema.parse({
      ...DEFAULT_PROMPT_TEMPLATE,
      ...template,
    });
  }

  /**
   * Build the prompt for one turn. Passages without text are ignored.
   */
  build(query: string, passages: readonly RetrievedPassage[]): PromptBundle {
    const texts = passages.map((p) => p.text).filter((text) => text.length > 0);

    if (texts.length === 0) {
      return {
        finalPrompt: this.buildFallbackPrompt(query),
        sourceContext: '',
        grounded: false,
        passageCount: 0,
      };
    }

    const context = texts.join(this.template.contextSeparator);

    return {
      finalPrompt: this.buildGroundedPrompt(query, context),
      sourceContext: texts.join(SOURCE_CONTEXT_SEPARATOR),
      grounded: true,
      passageCount: texts.length,
    };
  }

  buildGroundedPrompt(query: string, context: string): string {
    const { rolePreamble, groundedRole, groundedInstructions, answerCue } = this.template;
    const numbered = groundedInstructions.map((line, i) => `${i + 1}. ${line}`).join('\n');

    return (
      rolePreamble +
      ' ' +
      groundedRole +
      '\n\nInstructions:\n' +
      numbered +
      '\n\nContext:\n' +
      context +
      '\n\nQuestion: ' +
      query +
      '\n\n' +
      answerCue
    );
  }

  buildFallbackPrompt(query: string): string {
    const { rolePreamble, fallbackInstruction, answerCue } = this.template;

    return (
      rolePreamble +
      '\n\nQuestion: ' +
      query +
      '\n\n' +
      fallbackInstruction +
      '\n\n' +
      answerCue
    );
  }

  getTemplate(): PromptTemplate {
    return { ...this.template, groundedInstructions: [...this.template.groundedInstructions] };
  }
}

export function createPromptBuilder(template?: Partial<PromptTemplate>): PromptBuilder {
  return new PromptBuilder(template);
}
