import { EventEmitter } from 'events';

import { BrowserConfig } from '../../types/config';
import { LogLevel } from '../../types/enums';
import { CancellationToken, raceWithCancellation } from '../../utils/helpers/cancellation';
import { Semaphore } from '../../utils/helpers/semaphore';
import { Logger } from '../../utils/logger/Logger';
import { BrowserDisconnectedError, SupervisorHaltedError, errorMessage } from '../errors';
import { BrowserHandle, HandleOptions, IBrowserDriver, IBrowserProcess } from '../interfaces/IBrowserDriver';

export interface SupervisorOptions {
  concurrency: number;
  browser: BrowserConfig;
  logger?: Logger;
}

export interface SupervisorEvents {
  restarted: { generation: number };
  fatal: SupervisorHaltedError;
}

/**
 * Owns the browser process and hands out one handle per page session.
 *
 * At most `concurrency` handles are leased at a time. A handle released as
 * unhealthy, or a process that reports a disconnect, causes one restart per
 * process generation no matter how many sessions notice it. A failed restart
 * halts the pool: every pending and future lease rejects with
 * SupervisorHaltedError.
 */
export class BrowserPoolSupervisor extends EventEmitter {
  private readonly logger: Logger;
  private readonly slots: Semaphore;
  private readonly leased = new Set<BrowserHandle>();
  private process: IBrowserProcess | null = null;
  private generation = 0;
  private restarting: Promise<void> | null = null;
  private haltedError: SupervisorHaltedError | null = null;
  private closed = false;

  constructor(
    private readonly driver: IBrowserDriver,
    private readonly options: SupervisorOptions
  ) {
    super();
    this.logger = options.logger?.child('BrowserPool') ?? new Logger(LogLevel.INFO, 'BrowserPool');
    this.slots = new Semaphore(options.concurrency);
  }

  /**
   * Launch the first browser process. Throws when the launch fails.
   */
  async start(): Promise<void> {
    if (this.process) return;
    this.process = await this.launch(1);
    this.generation = 1;
    this.logger.info(`Browser started (${this.options.browser.type}, headless=${this.options.browser.headless})`);
  }

  /**
   * Wait for a free slot and a live process, then open a fresh handle
   */
  async lease(handleOptions: HandleOptions, token?: CancellationToken): Promise<BrowserHandle> {
    this.throwIfHalted();
    await this.slots.acquire(token);

    try {
      this.throwIfHalted();
      const process = await this.liveProcess(token);
      const handle = await process.newHandle(handleOptions);
      this.leased.add(handle);
      this.logger.debug(`Leased handle ${handle.id} (generation ${handle.generation}, active ${this.leased.size})`);
      return handle;
    } catch (error) {
      this.slots.release();
      if (error instanceof BrowserDisconnectedError && this.process) {
        await this.recover(this.process.generation);
      }
      throw error;
    }
  }

  /**
   * Return a handle. Unhealthy handles trigger recovery of their process before
   * the slot is given back.
   */
  async release(handle: BrowserHandle, healthy: boolean): Promise<void> {
    if (!this.leased.delete(handle)) {
      this.logger.warn(`Release of unknown handle ${handle.id}`);
      return;
    }

    try {
      await handle.close();
    } catch (error) {
      this.logger.debug(`Closing handle ${handle.id} failed: ${errorMessage(error)}`);
    }

    try {
      if (!healthy) {
        this.logger.warn(`Handle ${handle.id} reported unhealthy`);
        await this.recover(handle.generation);
      }
    } finally {
      this.slots.release();
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.slots.rejectAll(new SupervisorHaltedError('Browser pool closed'));
    const process = this.process;
    this.process = null;
    if (process) {
      try {
        await process.close();
      } catch (error) {
        this.logger.debug(`Closing browser failed: ${errorMessage(error)}`);
      }
    }
    this.logger.info('Browser closed');
  }

  isHalted(): boolean {
    return this.haltedError !== null;
  }

  getGeneration(): number {
    return this.generation;
  }

  getLeasedCount(): number {
    return this.leased.size;
  }

  override on<K extends keyof SupervisorEvents>(event: K, listener: (payload: SupervisorEvents[K]) => void): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof SupervisorEvents>(event: K, payload: SupervisorEvents[K]): boolean {
    return super.emit(event, payload);
  }

  private async liveProcess(token?: CancellationToken): Promise<IBrowserProcess> {
    if (this.restarting) {
      await (token ? raceWithCancellation(this.restarting, token) : this.restarting);
    }
    this.throwIfHalted();
    if (!this.process) {
      throw new SupervisorHaltedError('Browser pool not started');
    }
    if (!this.process.isConnected()) {
      await this.recover(this.process.generation);
      this.throwIfHalted();
    }
    if (!this.process) {
      throw new SupervisorHaltedError('Browser pool not started');
    }
    return this.process;
  }

  /**
   * Restart the process of `generation` unless that already happened
   */
  private recover(generation: number): Promise<void> {
    if (this.closed || this.haltedError) {
      return Promise.resolve();
    }
    if (this.restarting) {
      return this.restarting;
    }
    if (generation < this.generation) {
      // a newer process is already running
      return Promise.resolve();
    }

    this.restarting = this.restart().finally(() => {
      this.restarting = null;
    });
    return this.restarting;
  }

  private async restart(): Promise<void> {
    const old = this.process;
    const next = this.generation + 1;
    this.logger.warn(`Restarting browser (generation ${next})`);

    if (old) {
      try {
        await old.close();
      } catch (error) {
        this.logger.debug(`Closing dead browser failed: ${errorMessage(error)}`);
      }
    }

    try {
      this.process = await this.launch(next);
      this.generation = next;
      this.logger.info(`Browser restarted (generation ${next})`);
      this.emit('restarted', { generation: next });
    } catch (error) {
      this.process = null;
      this.haltedError = new SupervisorHaltedError(`Browser restart failed: ${errorMessage(error)}`);
      this.logger.error(this.haltedError.message);
      this.slots.rejectAll(this.haltedError);
      this.emit('fatal', this.haltedError);
    }
  }

  private async launch(generation: number): Promise<IBrowserProcess> {
    const process = await this.driver.launch(this.options.browser, generation);
    process.onDisconnect(() => {
      if (!this.closed && this.process === process) {
        this.logger.warn(`Browser process disconnected (generation ${generation})`);
      }
    });
    return process;
  }

  private throwIfHalted(): void {
    if (this.haltedError) {
      throw this.haltedError;
    }
    if (this.closed) {
      throw new SupervisorHaltedError('Browser pool closed');
    }
  }
}
