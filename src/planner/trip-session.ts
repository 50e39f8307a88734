import type { PipelineStage, TripPlan, TripPlanRequest } from '../types.js';
import { readErrorMessage } from '../utils/http-client.js';
import type { TripPlanner } from './trip-planner.js';

export interface TripSessionState {
  readonly stage: PipelineStage;
  readonly loading: boolean;
  readonly plan: TripPlan | null;
  readonly error: string | null;
}

export const IDLE_SESSION_STATE: TripSessionState = Object.freeze({
  stage: 'idle',
  loading: false,
  plan: null,
  error: null,
});

interface CreateTripSessionOptions {
  planner: TripPlanner;
  onChange?: (state: TripSessionState) => void;
}

/**
 * Holds what a view displays for trip planning. Each snapshot is replaced
 * whole, never patched, and a run that starts while another is in flight is
 * ignored.
 */
export const createTripSession = ({ planner, onChange }: CreateTripSessionOptions) => {
  let state: TripSessionState = IDLE_SESSION_STATE;

  const publish = (next: TripSessionState) => {
    state = Object.freeze(next);
    try {
      onChange?.(state);
    } catch (error) {
      console.error(`[Trip] Session listener failed on stage ${state.stage}:`, readErrorMessage(error));
    }
  };

  const plan = async (request: TripPlanRequest): Promise<TripSessionState> => {
    if (state.loading) {
      return state;
    }

    publish({ stage: 'resolving', loading: true, plan: null, error: null });
    const result = await planner.planTrip(request, {
      onStage: (stage) => {
        if (stage !== 'done' && stage !== 'failed' && stage !== state.stage) {
          publish({ ...state, stage });
        }
      },
    });

    if (result.ok) {
      publish({ stage: 'done', loading: false, plan: result.plan, error: null });
    } else {
      publish({ stage: 'failed', loading: false, plan: null, error: result.error });
    }
    return state;
  };

  return {
    plan,
    getState: () => state,
  };
};

export type TripSession = ReturnType<typeof createTripSession>;
