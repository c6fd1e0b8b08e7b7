import { describe, it, expect } from 'vitest';
import { TOOL_DEFINITIONS } from '../src/tool-definitions';

describe('tool-definitions', () => {
  const toolNames = TOOL_DEFINITIONS.map((t) => t.name);

  it('exports the expected number of tools', () => {
    expect(TOOL_DEFINITIONS.length).toBe(4);
  });

  it.each(['organize_workflow', 'detect_link_overlaps', 'plan_reindex', 'log_message'])(
    'includes %s',
    (name) => {
      expect(toolNames).toContain(name);
    }
  );

  it('has unique names', () => {
    expect(new Set(toolNames).size).toBe(toolNames.length);
  });

  it.each(TOOL_DEFINITIONS.map((t) => [t.name, t] as const))(
    '%s declares every required property',
    (_name, def) => {
      for (const key of def.inputSchema.required ?? []) {
        expect(def.inputSchema.properties).toHaveProperty(key);
      }
    }
  );

  it('documents the graph argument on graph tools', () => {
    for (const def of TOOL_DEFINITIONS) {
      if (def.name === 'log_message') continue;
      expect(def.inputSchema.required).toEqual(['graph']);
    }
  });
});
