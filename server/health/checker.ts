import { readFileSync } from "node:fs";
import type { Server } from "node:http";
import type { Logger } from "pino";
import type { ServiceConfig } from "../bootstrap/config";
import type { TlsConfig } from "../bootstrap/tls";
import { startHttpServer } from "../http/server";
import {
  activeResourceCountCheck,
  databasePingCheck,
  httpsGetCheck,
  tcpDialCheck,
  type Pingable
} from "./checks";
import { HealthRegistry } from "./registry";

export interface HealthCheckerOptions {
  logger: Logger;
  dbHealthQuery?: string;
  /** Called with exit code 1 when the listener fails. */
  exit?: (code: number) => void;
}

/**
 * Reports readiness of the storage inbox: the object storage backend, the
 * message broker and the database must all answer.
 */
export class HealthChecker {
  readonly storageUrl: string;
  readonly brokerAddress: string;
  private readonly serverCert: string;
  private readonly serverKey: string;
  private readonly logger: Logger;
  private readonly dbHealthQuery: string;
  private readonly exit: (code: number) => void;

  constructor(
    private readonly port: number,
    private readonly db: Pingable | undefined,
    conf: ServiceConfig,
    private readonly tlsConfig: TlsConfig,
    options: HealthCheckerOptions
  ) {
    let storageUrl = conf.storage.url;
    if (conf.storage.port) {
      storageUrl = `${storageUrl}:${conf.storage.port}`;
    }
    if (conf.storage.readypath) {
      storageUrl += conf.storage.readypath;
    }
    this.storageUrl = storageUrl;
    this.brokerAddress = `${conf.broker.host}:${conf.broker.port}`;
    this.serverCert = conf.server.cert;
    this.serverKey = conf.server.key;
    this.logger = options.logger;
    this.dbHealthQuery = options.dbHealthQuery ?? "SELECT 1";
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  get tlsEnabled(): boolean {
    return this.serverCert !== "" && this.serverKey !== "";
  }

  registry(): HealthRegistry {
    const health = new HealthRegistry();

    health.addLivenessCheck("goroutine-threshold", activeResourceCountCheck(100));

    health.addReadinessCheck("S3-backend-http", httpsGetCheck(this.storageUrl, { ca: this.tlsConfig.ca, timeoutMs: 5000 }));
    health.addReadinessCheck("broker-tcp", tcpDialCheck(this.brokerAddress, 5000));
    health.addReadinessCheck("database", databasePingCheck(this.db, 1000, this.dbHealthQuery));

    return health;
  }

  /**
   * Serves the health endpoints. A listener that cannot be set up or fails
   * later takes the process down with it.
   */
  run(): Server {
    const tls = this.tlsEnabled
      ? { cert: readFileSync(this.serverCert), key: readFileSync(this.serverKey) }
      : undefined;

    const { srv } = startHttpServer({ port: this.port, registry: this.registry(), logger: this.logger, tls });
    srv.on("error", (err) => {
      this.logger.fatal({ err, port: this.port }, "healthcheck listener failed");
      this.exit(1);
    });
    return srv;
  }
}
