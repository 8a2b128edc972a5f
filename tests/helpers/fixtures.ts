import { ConfigOverrides, DEFAULT_CONFIG, mergeConfig } from '../../src/core/config/ConfigurationManager';
import { ScanConfiguration } from '../../src/types/config';
import { LogLevel } from '../../src/types/enums';
import { Sleeper } from '../../src/utils/helpers/cancellation';
import { ReachabilityProbe } from '../../src/utils/helpers/network-helpers';
import { Logger } from '../../src/utils/logger/Logger';

/**
 * Default configuration without settle time and with quiet logging
 */
export function testConfig(overrides: ConfigOverrides = {}): ScanConfiguration {
  return mergeConfig(DEFAULT_CONFIG, { settleMs: 0, logLevel: LogLevel.ERROR, ...overrides });
}

export function silentLogger(level: LogLevel = LogLevel.DEBUG): Logger {
  return new Logger(level, '', []);
}

/**
 * Sleeper that records the requested delays and returns at once
 */
export function recordingSleep(): { sleep: Sleeper; delays: number[] } {
  const delays: number[] = [];
  const sleep: Sleeper = async (ms, token) => {
    delays.push(ms);
    token?.throwIfCancelled();
  };
  return { sleep, delays };
}

export function reachableProbe(): jest.Mock<ReturnType<ReachabilityProbe>, Parameters<ReachabilityProbe>> {
  return jest.fn<ReturnType<ReachabilityProbe>, Parameters<ReachabilityProbe>>(async () => ({
    reachable: true,
    status: 200,
    durationMs: 1,
  }));
}
