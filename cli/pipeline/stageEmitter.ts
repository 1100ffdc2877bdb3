import type { StageEvent, StageName } from '../../shared/types';
import { describeError } from '../errors';

export type { StageEvent, StageName, StageStatus } from '../../shared/types';

export type StageEventSender = (event: StageEvent) => void;

const nowIso = () => new Date().toISOString();

export const makeStageEmitter = (stage: StageName, send: StageEventSender) => ({
  start: (message?: string) => {
    send({ stage, status: 'start', message, ts: nowIso() });
  },
  success: (message?: string) => {
    send({ stage, status: 'success', message, ts: nowIso() });
  },
  failure: (error: unknown) => {
    send({ stage, status: 'failure', message: describeError(error), ts: nowIso() });
  },
});
