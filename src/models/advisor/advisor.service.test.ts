import { ChatTurn } from '../../interfaces/domain/ChatTurn';
import { ScriptedLlmClient } from '../../testing/fakes';
import { LlmError } from '../../utils/errorHandler';
import { AdvisorService, boundHistory, formatJobContext } from './advisor.service';

const user = (content: string): ChatTurn => ({ role: 'user', content });
const assistant = (content: string): ChatTurn => ({ role: 'assistant', content });

describe('boundHistory', () => {
  it('keeps the newest turns', () => {
    const history = [user('one'), assistant('two'), user('three'), assistant('four')];

    expect(boundHistory(history, 2, 1000)).toEqual([user('three'), assistant('four')]);
  });

  it('drops the oldest turns once the character budget is spent', () => {
    const history = [user('aaaa'), assistant('bb'), user('cccccc')];

    expect(boundHistory(history, 10, 8)).toEqual([assistant('bb'), user('cccccc')]);
  });

  it('drops a newest turn that alone exceeds the budget', () => {
    expect(boundHistory([user('short'), assistant('x'.repeat(20))], 10, 10)).toEqual([]);
  });
});

describe('formatJobContext', () => {
  it('renders at most five matches', () => {
    const jobs = Array.from({ length: 6 }, (_, i) => ({ title: `Job ${i + 1}` }));

    expect(formatJobContext(jobs).split('\n')).toHaveLength(5);
  });

  it('includes the known details of a match', () => {
    expect(formatJobContext([{ title: 'Python Developer', company: 'Acme', matchScore: 88.5, requiredSkills: 'Python', location: 'Riyadh' }]))
      .toBe('1. Python Developer at Acme (88.5% match); skills: Python; location: Riyadh');
  });
});

describe('AdvisorService', () => {
  const options = { maxHistoryTurns: 2, maxHistoryChars: 1000, maxTokens: 300 };

  it('sends the system prompt, bounded history and message', async () => {
    const llm = new ScriptedLlmClient().respond('chat', 'Highlight your SQL projects.');
    const advisor = new AdvisorService(llm, options);

    const reply = await advisor.reply({
      message: 'How can I improve my CV?',
      history: [user('Hi'), assistant('Hello!'), user('I am a developer'), assistant('Great.')],
      jobContext: [{ title: 'Python Developer', matchScore: 75 }]
    });

    expect(reply).toBe('Highlight your SQL projects.');
    const [request] = llm.callsFor('chat');
    expect(request.messages.map(message => message.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(request.messages[0].content).toContain("The user's current job matches:\n1. Python Developer (75% match)");
    expect(request.messages.slice(1)).toEqual([user('I am a developer'), assistant('Great.'), user('How can I improve my CV?')]);
  });

  it('leaves job matches out of the prompt when none are given', async () => {
    const llm = new ScriptedLlmClient().respond('chat', 'Sure.');
    const advisor = new AdvisorService(llm, options);

    await advisor.reply({ message: 'Hello', history: [] });

    expect(llm.requests[0].messages[0].content).not.toContain('current job matches');
  });

  it('surfaces model failures as LlmError', async () => {
    const llm = new ScriptedLlmClient().respond('chat', new Error('socket hang up'));
    const advisor = new AdvisorService(llm, options);

    await expect(advisor.reply({ message: 'Hello', history: [] }))
      .rejects.toEqual(new LlmError('The career advisor is unavailable right now, please try again later'));
  });
});
