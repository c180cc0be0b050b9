export const GateId = {
  STRUCTURE: 'structure',
  COMPLETENESS: 'completeness',
  TRACEABILITY: 'traceability',
  SECURITY: 'security',
  TESTABILITY: 'testability',
  PERFORMANCE: 'performance',
  DOCUMENTATION: 'documentation',
} as const;

export type BuiltInGateId = typeof GateId[keyof typeof GateId];
