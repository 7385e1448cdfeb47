import { DEFAULT_AGENT_RUN_CONFIG, AgentRunConfig, ToolExecutorConfig, mergeRunConfig } from '../config';

describe('Agent Configuration', () => {
  describe('DEFAULT_AGENT_RUN_CONFIG', () => {
    it('should have default toolChoice', () => {
      expect(DEFAULT_AGENT_RUN_CONFIG.toolChoice).toBe('auto');
    });

    it('should have default maxToolCallContinuations', () => {
      expect(DEFAULT_AGENT_RUN_CONFIG.maxToolCallContinuations).toBe(10);
    });

    it('should leave temperature to the provider', () => {
      expect(DEFAULT_AGENT_RUN_CONFIG.temperature).toBeUndefined();
    });

    it('should have default toolExecutorConfig', () => {
      const expectedTeConfig: ToolExecutorConfig = {
        executionStrategy: 'sequential',
      };
      expect(DEFAULT_AGENT_RUN_CONFIG.toolExecutorConfig).toEqual(expectedTeConfig);
    });
  });

  describe('mergeRunConfig', () => {
    const base: AgentRunConfig = { ...DEFAULT_AGENT_RUN_CONFIG, model: 'gpt-4o' };

    it('should return a copy of the base when there are no overrides', () => {
      const merged = mergeRunConfig(base);
      expect(merged).toEqual(base);
      expect(merged).not.toBe(base);
    });

    it('should let later overrides win', () => {
      const merged = mergeRunConfig(base, { temperature: 0.2, model: 'gpt-4o-mini' }, { temperature: 0.9 });
      expect(merged.model).toBe('gpt-4o-mini');
      expect(merged.temperature).toBe(0.9);
      expect(merged.toolChoice).toBe('auto');
    });

    it('should ignore undefined overrides and undefined fields', () => {
      const merged = mergeRunConfig(base, undefined, { maxToolCallContinuations: undefined, maxTokens: 200 });
      expect(merged.maxToolCallContinuations).toBe(10);
      expect(merged.maxTokens).toBe(200);
    });

    it('should merge toolExecutorConfig field by field', () => {
      const merged = mergeRunConfig(base, { toolExecutorConfig: { executionStrategy: 'parallel' } });
      expect(merged.toolExecutorConfig).toEqual({ executionStrategy: 'parallel' });
      expect(base.toolExecutorConfig).toEqual({ executionStrategy: 'sequential' });
    });
  });
});
