export const SWEEP_QUEUE_NAME = 'reelgrab-sweeps';
export const SWEEP_SCHEDULER_ID = 'retention-sweep';

export interface SweepJobPayload {
  trigger: 'schedule' | 'manual';
}
