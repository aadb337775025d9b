import { lookup } from 'node:dns/promises';
import { clearInterval, clearTimeout, setInterval, setTimeout } from 'node:timers';
import { STREAM_CACHE_CONFIG } from './config';

export type ConnectivityProbe = () => Promise<boolean>;
export type ConnectivityListener = (connected: boolean) => void;

/**
 * Reachability probe that resolves the given host. A resolver answer within
 * the timeout counts as connected.
 */
export function createDnsProbe(
  hostname: string,
  timeoutMs: number = STREAM_CACHE_CONFIG.CONNECTIVITY_PROBE_TIMEOUT_MS
): ConnectivityProbe {
  return () => new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs).unref();
    void lookup(hostname).then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      () => {
        clearTimeout(timer);
        resolve(false);
      }
    );
  });
}

/**
 * Polls a probe and reports connected/disconnected transitions. The first
 * observation only establishes the state; repeats of the same state are
 * never reported.
 */
export class ConnectivityMonitor {
  private connected: boolean | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private stopped = false;
  private listeners = new Set<ConnectivityListener>();

  constructor(
    private readonly probe: ConnectivityProbe,
    private readonly intervalMs: number = STREAM_CACHE_CONFIG.CONNECTIVITY_POLL_INTERVAL_MS
  ) { }

  /** null until the first probe has answered. */
  public get isConnected(): boolean | null {
    return this.connected;
  }

  public onChange(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public start() {
    if (this.timer || this.stopped) return;
    this.timer = setInterval(() => {
      void this.check();
    }, this.intervalMs).unref();
    void this.check();
  }

  public stop() {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.listeners.clear();
  }

  /** Runs the probe once. Overlapping calls share the probe in flight. */
  public check(): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.runProbe().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Records that a transfer just lost its connection, so the next successful
   * probe is reported as a transition back to connected.
   */
  public reportUnreachable() {
    this.update(false);
  }

  private async runProbe(): Promise<void> {
    let status: boolean;
    try {
      status = await this.probe();
    } catch (e: unknown) {
      console.warn('[Connectivity] Probe failed, treating as offline', e);
      status = false;
    }
    this.update(status);
  }

  private update(status: boolean) {
    if (this.stopped) return;
    const previous = this.connected;
    this.connected = status;
    if (previous === null || previous === status) return;

    console.log(`[Connectivity] ${status ? 'Connected' : 'Disconnected'}`);
    for (const listener of this.listeners) {
      listener(status);
    }
  }
}
