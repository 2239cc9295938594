import newrelic from 'newrelic';
import { createLogger } from './logger';

const logger = createLogger('NewRelicMetrics');

// Check if New Relic is available and properly configured
const isNewRelicAvailable = (): boolean => {
  try {
    return (
      typeof newrelic.recordMetric === 'function' && typeof newrelic.noticeError === 'function'
    );
  } catch {
    return false;
  }
};

export type ShutdownStage = 'sessions' | 'devices';

export class NewRelicMetrics {
  private static instance: NewRelicMetrics;
  private isEnabled: boolean;

  private constructor() {
    this.isEnabled = isNewRelicAvailable();
    if (this.isEnabled) {
      logger.info('New Relic metrics initialized');
    } else {
      logger.warn('New Relic not available or not configured');
    }
  }

  public static getInstance(): NewRelicMetrics {
    if (!NewRelicMetrics.instance) {
      NewRelicMetrics.instance = new NewRelicMetrics();
    }
    return NewRelicMetrics.instance;
  }

  public recordSessionOpened(activeSessions: number): void {
    if (!this.isEnabled) return;

    try {
      newrelic.incrementMetric('Custom/Gateway/Sessions/Opened');
      newrelic.recordMetric('Custom/Gateway/Sessions/Active', activeSessions);
    } catch (error) {
      logger.debug({ err: error }, 'Failed to record session open');
    }
  }

  public recordSessionClosed(activeSessions: number, durationMs: number): void {
    if (!this.isEnabled) return;

    try {
      newrelic.incrementMetric('Custom/Gateway/Sessions/Closed');
      newrelic.recordMetric('Custom/Gateway/Sessions/Active', activeSessions);
      newrelic.recordMetric('Custom/Gateway/Sessions/DurationMs', durationMs);
    } catch (error) {
      logger.debug({ err: error }, 'Failed to record session close');
    }
  }

  /**
   * Record device connection state (1 for connected, 0 for disconnected)
   */
  public recordDeviceConnection(device: string, connected: boolean): void {
    if (!this.isEnabled) return;

    try {
      newrelic.recordMetric(`Custom/Device/${device}/Connected`, connected ? 1 : 0);
    } catch (error) {
      logger.debug({ err: error }, 'Failed to record device connection');
    }
  }

  public recordDeviceError(device: string, error: Error): void {
    if (!this.isEnabled) return;

    try {
      newrelic.noticeError(error, {
        device,
        errorType: 'DeviceError',
      });
      newrelic.incrementMetric(`Custom/Device/${device}/Errors`);
    } catch (err) {
      logger.debug({ err }, 'Failed to record device error');
    }
  }

  public recordShutdownTimeout(stage: ShutdownStage): void {
    if (!this.isEnabled) return;

    try {
      newrelic.incrementMetric(`Custom/Gateway/ShutdownTimeout/${stage}`);
    } catch (error) {
      logger.debug({ err: error }, 'Failed to record shutdown timeout');
    }
  }

  public recordStartup(deviceCount: number, testMode: boolean): void {
    if (!this.isEnabled) return;

    try {
      newrelic.addCustomAttribute('startupDeviceCount', deviceCount);
      newrelic.addCustomAttribute('testMode', testMode);
      newrelic.addCustomAttribute('nodeVersion', process.version);

      newrelic.recordMetric('Custom/Service/Startup', 1);
      newrelic.recordMetric('Custom/Service/DeviceCount', deviceCount);
    } catch (error) {
      logger.debug({ err: error }, 'Failed to record startup');
    }
  }

  public recordShutdown(reason: string): void {
    if (!this.isEnabled) return;

    try {
      newrelic.addCustomAttribute('shutdownReason', reason);
      newrelic.recordMetric('Custom/Service/Shutdown', 1);
      newrelic.recordMetric('Custom/Service/Uptime', process.uptime());
    } catch (error) {
      logger.debug({ err: error }, 'Failed to record shutdown');
    }
  }
}
