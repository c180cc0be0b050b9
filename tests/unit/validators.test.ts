import {
  validateIdea,
  validateStageInputs,
  validateAgentDescriptor,
  validateGateConfig,
  validateServerConfig,
  ValidationError,
  MIN_IDEA_LENGTH,
} from '../../src/utils/validators';
import { getStageConfig } from '../../src/pipeline/stages';
import { getAgentDescriptor } from '../../src/agents';
import {
  type GateConfig,
  type McpServerConfig,
  AgentKind,
  CapabilityTag,
  ChainStageId,
} from '../../src/types';

function createGate(overrides: Partial<GateConfig> = {}): GateConfig {
  return {
    id: 'custom',
    name: 'Custom',
    requiredCapabilityTags: [],
    threshold: 0.7,
    timeoutMs: 1000,
    required: false,
    dependsOn: [],
    ...overrides,
  };
}

function createServer(overrides: Partial<McpServerConfig> = {}): McpServerConfig {
  return {
    id: 'docs',
    capabilityTags: [CapabilityTag.DOCUMENTATION],
    priority: 1,
    healthCheck: { intervalMs: 1000, timeoutMs: 500 },
    maxConcurrentLeases: 2,
    ...overrides,
  };
}

describe('Validators', () => {
  describe('validateIdea', () => {
    it('accepts an idea of the minimum length', () => {
      expect(validateIdea('x'.repeat(MIN_IDEA_LENGTH))).toEqual([]);
    });

    it('rejects a blank idea', () => {
      const errors = validateIdea('   ');
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('Idea is required');
      expect(errors[0].field).toBe('idea');
    });

    it('rejects a short idea', () => {
      const errors = validateIdea('tiny app');
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(ValidationError);
      expect(errors[0].message).toContain(`at least ${MIN_IDEA_LENGTH} characters`);
    });
  });

  describe('validateStageInputs', () => {
    it('passes when the previous stage output is available', () => {
      const errors = validateStageInputs(getStageConfig(ChainStageId.PRD), {
        idea: 'An idea',
        [ChainStageId.IDEA_DEFINITION]: '# Problem Statement',
      });
      expect(errors).toEqual([]);
    });

    it('reports a missing or blank input', () => {
      const errors = validateStageInputs(getStageConfig(ChainStageId.TRD), { [ChainStageId.PRD]: '  ' });
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('Stage trd requires input "prd"');
    });
  });

  describe('validateAgentDescriptor', () => {
    it('accepts every built-in descriptor', () => {
      for (const kind of Object.values(AgentKind)) {
        expect(validateAgentDescriptor(getAgentDescriptor(kind))).toEqual([]);
      }
    });

    it('rejects a zero priority and empty keywords', () => {
      const descriptor = { ...getAgentDescriptor(AgentKind.FRONTEND), priority: 0, domainKeywords: [] };
      const fields = validateAgentDescriptor(descriptor).map((e) => e.field);
      expect(fields).toEqual(['domainKeywords', 'priority']);
    });
  });

  describe('validateGateConfig', () => {
    it('accepts a valid gate with a known dependency', () => {
      expect(validateGateConfig(createGate({ dependsOn: ['structure'] }), ['structure', 'custom'])).toEqual([]);
    });

    it('rejects self and unknown dependencies', () => {
      const errors = validateGateConfig(createGate({ dependsOn: ['custom', 'ghost'] }), ['custom']);
      expect(errors.map((e) => e.message)).toEqual([
        'Gate cannot depend on itself',
        'Unknown gate dependency "ghost"',
      ]);
    });

    it('rejects thresholds outside [0,1] and non-positive timeouts', () => {
      const errors = validateGateConfig(createGate({ threshold: 1.2, timeoutMs: 0 }), ['custom']);
      expect(errors.map((e) => e.field)).toEqual(['threshold', 'timeoutMs']);
    });
  });

  describe('validateServerConfig', () => {
    it('accepts a valid server', () => {
      expect(validateServerConfig(createServer())).toEqual([]);
    });

    it('rejects a zero lease cap', () => {
      const errors = validateServerConfig(createServer({ maxConcurrentLeases: 0 }));
      expect(errors).toHaveLength(1);
      expect(errors[0].field).toBe('maxConcurrentLeases');
    });

    it('rejects a probe timeout longer than its interval', () => {
      const errors = validateServerConfig(createServer({ healthCheck: { intervalMs: 100, timeoutMs: 200 } }));
      expect(errors[0].field).toBe('healthCheck.timeoutMs');
    });
  });
});
