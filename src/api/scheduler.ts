/**
 * Cron-based heartbeat scheduler.
 * Checkpoints the aggregate point and rolls the reward midnight forward so
 * that idle periods never grow past the replay bound.
 */

import * as cron from 'node-cron';
import { ApiState, runHeartbeat } from './state';
import { SchedulerConfig } from './config';

export class HeartbeatScheduler {
  private job: cron.ScheduledTask | null = null;
  private running = false;

  constructor(
    private state: ApiState,
    private config: SchedulerConfig
  ) {}

  start(): void {
    this.job = cron.schedule(this.config.heartbeatCron, () => {
      this.handleHeartbeat();
    }, { timezone: this.config.timezone });

    console.log(`Scheduler: heartbeat="${this.config.heartbeatCron}" (${this.config.timezone})`);
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }

  /** Run one heartbeat now. Overlapping runs are skipped. */
  handleHeartbeat(): void {
    if (this.running) {
      console.log('Scheduler: skip heartbeat, previous run still in progress');
      return;
    }
    this.running = true;

    runHeartbeat(this.state)
      .then(result => {
        console.log(`Scheduler: checkpointed epoch ${result.epoch}, midnight ${result.latestMidnight}`);
      })
      .catch(err => {
        console.error('Scheduler: heartbeat failed:', err);
      })
      .finally(() => {
        this.running = false;
      });
  }
}
