import { AgentOutputError } from '../../../src/agents/errors';
import { SynthesisAgent } from '../../../src/agents/synthesis-agent';
import { initialThreadState } from '../../../src/orchestrator/thread-state';
import type { ThreadState } from '../../../src/orchestrator/thread-state';
import { createFakeModel, lastRequest } from '../../helpers/fake-model';

const state: ThreadState = {
  ...initialThreadState(),
  currentQuery: 'Tell me about Microsoft',
  researchFindings: 'Microsoft grew its cloud revenue.',
  messageHistory: [{ role: 'user', content: 'Tell me about Microsoft' }],
};

describe('SynthesisAgent', () => {
  it('should compose the final response from the findings', async () => {
    const model = createFakeModel('Microsoft is growing through its cloud business.\n');

    const update = await new SynthesisAgent(model).run(state);

    expect(update).toEqual({
      messageHistory: [{ role: 'assistant', content: 'Microsoft is growing through its cloud business.', stage: 'compose' }],
      finalResponse: 'Microsoft is growing through its cloud business.',
    });
    const request = lastRequest(model);
    expect(request.prompt).toBe('Latest user query: Tell me about Microsoft\n\nResearch findings to base your answer on:\nMicrosoft grew its cloud revenue.');
    expect(request.messages).toEqual([{ role: 'user', text: 'Tell me about Microsoft' }]);
    expect(request.json).toBeUndefined();
  });

  it('should reject an empty answer', async () => {
    const model = createFakeModel('');

    await expect(new SynthesisAgent(model).run(state)).rejects.toThrow(new AgentOutputError('SynthesisAgent', 'model produced an empty response'));
  });
});
