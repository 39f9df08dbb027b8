/**
 * Matrix Controller
 *
 * Main orchestration class: wires the client, the polling coordinator and
 * the observability endpoints for one matrix switcher.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { Logger } from 'pino';
import type { MatrixConfig } from './config/schema.js';
import { MatrixClient } from './adapters/matrix/client.js';
import { PollingCoordinator } from './core/coordinator/coordinator.js';
import type { DeviceInfo } from './core/protocol/types.js';
import { initLogger, controllerLogger } from './observability/logger.js';
import { HealthManager, createDeviceChecker } from './observability/health.js';
import { getMetrics, getContentType } from './observability/metrics.js';
import { VERSION } from './version.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface ControllerOptions {
  /** Serve metrics and health endpoints when enabled in config (default: true) */
  serve: boolean;
  /** Start the refresh timer when polling is enabled in config (default: true) */
  poll: boolean;
}

const DEFAULT_CONTROLLER_OPTIONS: ControllerOptions = {
  serve: true,
  poll: true,
};

export const DEFAULT_DEVICE_INFO: DeviceInfo = {
  model: 'Matrix Switcher',
  firmware: 'Unknown',
};

type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

// -----------------------------------------------------------------------------
// Controller Class
// -----------------------------------------------------------------------------

export class MatrixController {
  private readonly config: MatrixConfig;
  private readonly options: ControllerOptions;
  private readonly logger: Logger;

  private client: MatrixClient | null = null;
  private coordinator: PollingCoordinator | null = null;
  private deviceInfo: DeviceInfo = { ...DEFAULT_DEVICE_INFO };

  // Observability
  private healthManager: HealthManager;
  private metricsServer: Server | null = null;
  private healthServer: Server | null = null;

  private running = false;

  constructor(config: MatrixConfig, options: Partial<ControllerOptions> = {}) {
    this.config = config;
    this.options = { ...DEFAULT_CONTROLLER_OPTIONS, ...options };

    initLogger({
      level: config.logging.level,
      pretty: config.logging.pretty || config.environment === 'development',
    });

    this.logger = controllerLogger();
    this.healthManager = new HealthManager(VERSION);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Connect, identify the device, run the first refresh, and start polling.
   * Rejects with ConnectionError when the device cannot be reached.
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error('Controller is already running');
    }

    const { device } = this.config;
    this.logger.info({ host: device.host, port: device.port }, 'Starting matrix controller');

    try {
      this.initDevice();
      await this.identifyDevice();

      const coordinator = this.requireCoordinator();
      const first = await coordinator.requestRefresh();
      if (!first.ok) {
        this.logger.warn({ error: first.error }, 'Initial refresh failed');
      }

      if (this.options.poll && this.config.polling.enabled) {
        coordinator.start();
      }

      if (this.options.serve) {
        await this.initObservability();
      }

      this.running = true;
      this.logger.info(
        { model: this.deviceInfo.model, firmware: this.deviceInfo.firmware },
        'Matrix controller started'
      );
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to start matrix controller');
      await this.stop();
      throw error;
    }
  }

  /**
   * Stop polling, close endpoints, and disconnect. Safe to call more than once.
   */
  async stop(): Promise<void> {
    this.logger.info('Stopping matrix controller');

    this.healthManager.stopBackgroundChecks();
    await this.stopObservabilityServers();

    if (this.coordinator) {
      await this.coordinator.dispose();
      this.coordinator = null;
    }

    if (this.client) {
      await this.client.disconnect();
      this.client = null;
    }

    this.running = false;
    this.logger.info('Matrix controller stopped');
  }

  // ---------------------------------------------------------------------------
  // Initialisation
  // ---------------------------------------------------------------------------

  private initDevice(): void {
    const { device, polling, names } = this.config;

    const client = new MatrixClient({
      host: device.host,
      port: device.port,
      numInputs: device.numInputs,
      numOutputs: device.numOutputs,
      connectTimeout: device.connectTimeout,
      timings: {
        commandDelay: device.commandDelay,
        responseTimeout: device.responseTimeout,
        drainTimeout: device.drainTimeout,
      },
    });

    client.onEvent((event) => {
      if (event.type === 'connected') {
        this.logger.info({ reconnect: event.reconnect }, 'Connected to matrix');
      } else if (event.type === 'disconnected') {
        this.logger.debug({ reason: event.reason }, 'Matrix connection closed');
      }
    });

    const coordinator = new PollingCoordinator(client, { interval: polling.interval, names });

    coordinator.onEvent((event) => {
      if (event.type === 'preset_changed') {
        this.logger.info({ preset: event.preset }, 'Current preset changed');
      }
    });

    this.healthManager.registerChecker('device', createDeviceChecker(() => this.coordinator));

    this.client = client;
    this.coordinator = coordinator;
  }

  private async identifyDevice(): Promise<void> {
    const info = await this.requireClient().testConnection();

    this.deviceInfo = {
      model: info.model || DEFAULT_DEVICE_INFO.model,
      firmware: info.firmware || DEFAULT_DEVICE_INFO.firmware,
    };
  }

  private async initObservability(): Promise<void> {
    const { metrics, health } = this.config;

    if (metrics.enabled) {
      this.metricsServer = await listen(metrics.port, async (req, res) => {
        if (req.url === metrics.path) {
          res.setHeader('Content-Type', getContentType());
          res.end(await getMetrics());
        } else {
          res.statusCode = 404;
          res.end('Not found');
        }
      });

      this.logger.info({ port: metrics.port, path: metrics.path }, 'Metrics endpoint started');
    }

    if (health.enabled) {
      this.healthServer = await listen(health.port, async (req, res) => {
        res.setHeader('Content-Type', 'application/json');

        if (req.url === '/health' || req.url === '/health/') {
          const report = await this.healthManager.health();
          res.statusCode = report.status === 'unhealthy' ? 503 : 200;
          res.end(JSON.stringify(report));
        } else if (req.url === '/health/live' || req.url === '/live') {
          const liveness = this.healthManager.liveness();
          res.statusCode = liveness.alive ? 200 : 503;
          res.end(JSON.stringify(liveness));
        } else if (req.url === '/health/ready' || req.url === '/ready') {
          const readiness = await this.healthManager.readiness();
          res.statusCode = readiness.ready ? 200 : 503;
          res.end(JSON.stringify(readiness));
        } else {
          res.statusCode = 404;
          res.end(JSON.stringify({ error: 'Not found' }));
        }
      });

      this.healthManager.startBackgroundChecks(health.checkInterval);
      this.logger.info({ port: health.port }, 'Health endpoint started');
    }
  }

  private async stopObservabilityServers(): Promise<void> {
    if (this.metricsServer) {
      await close(this.metricsServer);
      this.metricsServer = null;
    }

    if (this.healthServer) {
      await close(this.healthServer);
      this.healthServer = null;
    }
  }

  private requireClient(): MatrixClient {
    if (!this.client) {
      throw new Error('Controller is not started');
    }
    return this.client;
  }

  private requireCoordinator(): PollingCoordinator {
    if (!this.coordinator) {
      throw new Error('Controller is not started');
    }
    return this.coordinator;
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  isRunning(): boolean {
    return this.running;
  }

  getConfig(): Readonly<MatrixConfig> {
    return this.config;
  }

  getDeviceInfo(): DeviceInfo {
    return { ...this.deviceInfo };
  }

  getClient(): MatrixClient {
    return this.requireClient();
  }

  getCoordinator(): PollingCoordinator {
    return this.requireCoordinator();
  }

  getHealthManager(): HealthManager {
    return this.healthManager;
  }
}

// -----------------------------------------------------------------------------
// HTTP Helpers
// -----------------------------------------------------------------------------

function listen(port: number, handler: RequestHandler): Promise<Server> {
  const logger = controllerLogger();

  const server = createServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      logger.error({ err: error, url: req.url }, 'Request handler error');
      res.statusCode = 500;
      res.end();
    });
  });

  return new Promise<Server>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.removeListener('error', reject);
      resolve(server);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
}
