import { useReducer } from 'react';
import type {
  AnalysisOutcome,
  GradationAnalysis,
  GradationError,
  InterpolationMethod,
  SieveSpec,
} from '@/types/gradation';
import { defaultSieveSet } from '@/data/sieveSets';
import { DEFAULT_ANALYSIS_OPTIONS } from '@/config/gradation';

export interface SieveWorkspaceState {
  sieveSpec: SieveSpec;
  includePan: boolean;
  interpolation: InterpolationMethod;
  input: string;
  analysis: GradationAnalysis | null;
  error: GradationError | null;
}

export type SieveWorkspaceAction =
  | { type: 'setSieveSpec'; sieveSpec: SieveSpec }
  | { type: 'setIncludePan'; includePan: boolean }
  | { type: 'setInterpolation'; interpolation: InterpolationMethod }
  | { type: 'setInput'; input: string }
  | { type: 'analysisFinished'; outcome: AnalysisOutcome };

export const initialSieveWorkspaceState: SieveWorkspaceState = {
  sieveSpec: defaultSieveSet,
  includePan: DEFAULT_ANALYSIS_OPTIONS.includePan,
  interpolation: DEFAULT_ANALYSIS_OPTIONS.interpolation,
  input: '',
  analysis: null,
  error: null,
};

/**
 * Any change to the inputs drops the displayed result, so a table or report
 * never sits next to weights or settings it was not computed from.
 */
export function sieveWorkspaceReducer(state: SieveWorkspaceState, action: SieveWorkspaceAction): SieveWorkspaceState {
  switch (action.type) {
    case 'setSieveSpec':
      return { ...state, sieveSpec: action.sieveSpec, analysis: null, error: null };
    case 'setIncludePan':
      return { ...state, includePan: action.includePan, analysis: null, error: null };
    case 'setInterpolation':
      return { ...state, interpolation: action.interpolation, analysis: null, error: null };
    case 'setInput':
      return { ...state, input: action.input, analysis: null, error: null };
    case 'analysisFinished':
      return action.outcome.ok
        ? { ...state, analysis: action.outcome.analysis, error: null }
        : { ...state, analysis: null, error: action.outcome.error };
  }
}

export function useSieveWorkspace() {
  return useReducer(sieveWorkspaceReducer, initialSieveWorkspaceState);
}
