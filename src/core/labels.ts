/**
 * Timer states and actions with their display names
 */

export const TimerState = {
  Uninitialised: 'UNINITIALISED',
  Running: 'RUNNING',
  Paused: 'PAUSED',
  Stopped: 'STOPPED',
} as const;

export type TimerState = (typeof TimerState)[keyof typeof TimerState];

export const TimerAction = {
  Start: 'START',
  Split: 'SPLIT',
  Pause: 'PAUSE',
  Resume: 'RESUME',
  Stop: 'STOP',
} as const;

export type TimerAction = (typeof TimerAction)[keyof typeof TimerAction];

const STATE_LABELS: Record<TimerState, string> = {
  UNINITIALISED: 'uninitialised',
  RUNNING: 'running',
  PAUSED: 'paused',
  STOPPED: 'stopped',
};

const ACTION_LABELS: Record<TimerAction, string> = {
  START: 'start',
  SPLIT: 'split',
  PAUSE: 'pause',
  RESUME: 'resume',
  STOP: 'stop',
};

export function stateLabel(state: TimerState): string {
  return STATE_LABELS[state];
}

export function actionLabel(action: TimerAction): string {
  return ACTION_LABELS[action];
}
