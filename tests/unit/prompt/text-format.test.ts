import { describe, it, expect } from 'vitest';
import { formatPromptAsText } from '../../../src/prompt/text-format.js';
import { PromptAssembler } from '../../../src/prompt/assembler.js';
import { createExamples, createPersona, createTurns } from '../../utils/mocks.js';

describe('formatPromptAsText', () => {
  const persona = createPersona({ examples: createExamples(1) });
  const prompt = new PromptAssembler().assemble(persona, createTurns(['Hi', 'Hello!']), 'How are you?');

  it('should render the system prompt then one line per message', () => {
    expect(formatPromptAsText(prompt)).toBe(
      `${prompt.systemPrompt}\n\n` +
        [
          'User: example question 1',
          'Assistant: example answer 1',
          'User: Hi',
          'Assistant: Hello!',
          'User: How are you?',
          'Assistant: ',
        ].join('\n')
    );
  });

  it('should use custom speaker labels', () => {
    const text = formatPromptAsText(prompt, { user: 'Visitor', assistant: 'Tester' });

    expect(text.endsWith('Visitor: How are you?\nTester: ')).toBe(true);
  });
});
