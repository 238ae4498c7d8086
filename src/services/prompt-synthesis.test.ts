import { FakeTextClient, respondByPrompt } from '../test/fakes';
import { setLogLevel } from '../utils/logger';
import {
  extractKeyFacts,
  generateTitle,
  generateVisualPrompt,
  stripWrappingQuotes,
  summarizeGlobalContext,
  truncateWithEllipsis,
} from './prompt-synthesis';

beforeAll(() => setLogLevel('error'));

describe('truncateWithEllipsis', () => {
  it('leaves short values alone', () => {
    expect(truncateWithEllipsis('short', 10)).toBe('short');
  });

  it('cuts to exactly the budget including the ellipsis', () => {
    expect(truncateWithEllipsis('abcdefghij', 5)).toBe('abcd…');
  });
});

describe('stripWrappingQuotes', () => {
  it('removes one matching pair', () => {
    expect(stripWrappingQuotes('"The Sun"')).toBe('The Sun');
    expect(stripWrappingQuotes('“Moonrise”')).toBe('Moonrise');
  });

  it('keeps unmatched quotes', () => {
    expect(stripWrappingQuotes("Sam's Trip")).toBe("Sam's Trip");
    expect(stripWrappingQuotes('"Open ended')).toBe('"Open ended');
  });
});

describe('summarizeGlobalContext', () => {
  it('never exceeds the character budget', async () => {
    const client = new FakeTextClient(() => 'x'.repeat(120));

    const summary = await summarizeGlobalContext(client, 'story', 50);

    expect(summary).toHaveLength(50);
    expect(summary.endsWith('…')).toBe(true);
  });

  it('passes the budget to the model', async () => {
    const client = new FakeTextClient(() => 'A tale of two foxes.');

    await expect(summarizeGlobalContext(client, 'story', 50)).resolves.toBe('A tale of two foxes.');
    expect(client.calls[0].variables).toEqual({ text: 'story', max_chars: 50 });
  });
});

describe('generateTitle', () => {
  it('strips a wrapping quote pair', async () => {
    const client = new FakeTextClient(() => '"The Sun"');
    await expect(generateTitle(client, 'text')).resolves.toBe('The Sun');
  });

  it('leaves an apostrophe untouched', async () => {
    const client = new FakeTextClient(() => "Sam's Trip");
    await expect(generateTitle(client, 'text')).resolves.toBe("Sam's Trip");
  });

  it('truncates long titles', async () => {
    const client = new FakeTextClient(() => 'A'.repeat(30));
    await expect(generateTitle(client, 'text', 10)).resolves.toBe('AAAAAAAAA…');
  });
});

describe('extractKeyFacts', () => {
  it('reports failure instead of throwing', async () => {
    const client = new FakeTextClient(() => {
      throw new Error('rate limited');
    });

    await expect(extractKeyFacts(client, 'scene', ['s1'])).resolves.toEqual({ success: false, error: 'rate limited' });
  });
});

describe('generateVisualPrompt', () => {
  it('prepends key facts to the source snippets', async () => {
    const client = new FakeTextClient(
      respondByPrompt({
        KEY_FACTS: () => '- red kite\n- 1912',
        VISUAL_PROMPT: () => '  A red kite over a harbor in 1912, wide shot.  ',
      })
    );

    const prompt = await generateVisualPrompt(client, {
      sceneSummary: 'A kite flies',
      globalSummary: 'A harbor town story',
      sourceSentences: ['The red kite rose.', 'It was 1912.'],
    }, 'Default style');

    expect(prompt).toBe('A red kite over a harbor in 1912, wide shot.');
    expect(client.callsFor('VISUAL_PROMPT')[0].variables).toEqual({
      scene: 'A kite flies',
      global_context: 'A harbor town story',
      style_guide: 'Default style',
      references: 'Key facts to preserve:\n- red kite\n- 1912\n\nThe red kite rose.\nIt was 1912.',
    });
  });

  it('proceeds without facts when extraction fails', async () => {
    const client = new FakeTextClient(
      respondByPrompt({
        KEY_FACTS: () => {
          throw new Error('boom');
        },
        VISUAL_PROMPT: () => 'A quiet street at dawn.',
      })
    );

    await generateVisualPrompt(client, { sceneSummary: 's', sourceSentences: ['Only sentence.'] });

    expect(client.callsFor('VISUAL_PROMPT')[0].variables?.references).toBe('Only sentence.');
  });

  it('skips fact extraction without sources and prefers an explicit style guide', async () => {
    const client = new FakeTextClient(respondByPrompt({ VISUAL_PROMPT: () => 'prompt' }));

    await generateVisualPrompt(client, { sceneSummary: 's', styleGuide: 'Watercolor' }, 'Default style');

    expect(client.callsFor('KEY_FACTS')).toHaveLength(0);
    expect(client.callsFor('VISUAL_PROMPT')[0].variables).toEqual({
      scene: 's',
      global_context: '',
      style_guide: 'Watercolor',
      references: '',
    });
  });
});
