import { type CapabilityRequest, CapabilityTag } from '../types';

export interface CapabilityFallback {
  name: string;
  handle(request: CapabilityRequest): unknown;
}

const genericSearch: CapabilityFallback = {
  name: 'generic-search',
  handle: (request) => ({
    source: 'generic-search',
    query: request.query,
    guidance: `No documentation server answered. Consult the project's README, the official reference for each dependency, and search results for "${request.query}".`,
  }),
};

const singlePass: CapabilityFallback = {
  name: 'single-pass',
  handle: (request) => ({
    mode: 'single-pass',
    query: request.query,
    guidance: 'Reason about the request directly in one pass; no structured multi-step analysis was available.',
  }),
};

const templateScaffold: CapabilityFallback = {
  name: 'template-scaffold',
  handle: (request) => ({
    template: [
      '## Layout',
      '',
      'Header, primary content area, secondary navigation.',
      '',
      '## Components',
      '',
      `- Components required for: ${request.query}`,
      '',
      '## States',
      '',
      '- Loading, empty, error and populated states',
    ].join('\n'),
  }),
};

const manualChecklist: CapabilityFallback = {
  name: 'manual-checklist',
  handle: (request) => ({
    checklist: [
      `Exercise the primary path for: ${request.query}`,
      'Verify every acceptance criterion by hand',
      'Check error handling with invalid input',
      'Record results and open issues for every failure',
    ],
  }),
};

/** Degraded handlers used when no server can serve a capability. */
export const DEFAULT_FALLBACKS: Record<CapabilityTag, CapabilityFallback> = {
  [CapabilityTag.DOCUMENTATION]: genericSearch,
  [CapabilityTag.REASONING]: singlePass,
  [CapabilityTag.UI_GENERATION]: templateScaffold,
  [CapabilityTag.TEST_AUTOMATION]: manualChecklist,
};
