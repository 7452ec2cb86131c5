import { buildSystemPrompt, CONNECT_FIRST_DIRECTIVE, REQUEST_ONLY_DIRECTIVE } from '../prompt';
import { parseActionPlan } from '../../plan/parser';
import { describeRegistry } from '../../tools/schema';
import { createToolRegistry } from '../../tools/registry';
import { createBrokerCapabilities } from '../../tools/broker';

const tools = describeRegistry(createToolRegistry(createBrokerCapabilities()));

describe('buildSystemPrompt', () => {
  it('requires connect first when not connected', () => {
    const prompt = buildSystemPrompt(false, tools);

    expect(prompt).toContain('The connection status to the broker is currently not connected.');
    expect(prompt).toContain(CONNECT_FIRST_DIRECTIVE);
    expect(prompt).not.toContain(REQUEST_ONLY_DIRECTIVE);
  });

  it('never requires connect when already connected', () => {
    const prompt = buildSystemPrompt(true, tools);

    expect(prompt).toContain('The connection status to the broker is currently already connected.');
    expect(prompt).toContain(REQUEST_ONLY_DIRECTIVE);
    expect(prompt).not.toContain(CONNECT_FIRST_DIRECTIVE);
  });

  it('embeds every tool schema in catalogue order', () => {
    const prompt = buildSystemPrompt(false, tools);

    expect(prompt).toContain(
      `Use only the following tools with their exact parameters as defined in their schemas (no extra fields): ${tools.join(', ')}.`,
    );
    expect(prompt.indexOf('connect: Parameters')).toBeLessThan(prompt.indexOf('accountValues: Parameters'));
  });

  it('states the output contract', () => {
    const prompt = buildSystemPrompt(true, tools);

    expect(prompt).toContain("Respond with a single object containing 'actions'");
    expect(prompt).toContain("must have 'name' (tool name) and 'parameters'");
    expect(prompt).toContain('executed sequentially, in the order given');
  });

  it('ships worked examples the action parser accepts', () => {
    const prompt = buildSystemPrompt(false, []);
    const examples = prompt.match(/\{'actions': .*?\]\}/g) ?? [];

    expect(examples.map((e) => parseActionPlan(e).actions.map((a) => a.name))).toEqual([
      ['connect', 'reqMktData'],
      ['reqMktData'],
      ['disconnect'],
    ]);
  });

  it('is deterministic', () => {
    expect(buildSystemPrompt(false, tools)).toBe(buildSystemPrompt(false, tools));
  });
});
