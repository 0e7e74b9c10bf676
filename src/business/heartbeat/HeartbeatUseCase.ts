import type { CustomerRepository } from "../../repositories/interface/CustomerRepository";
import type { LogFileWriter } from "../../services/LogFileWriter";
import type { HeartbeatResponse } from "../../shared/responses/HeartbeatResponse";
import { formatHeartbeatTimestamp } from "../../utils/timestamp";
import { Logger } from "../../utils/logger";

/**
 * Liveness record for the CRM: one "alive" line, then the outcome of a database ping.
 * A failed ping is recorded in the heartbeat log rather than failing the run.
 */
export class HeartbeatUseCase {
  constructor(
    private readonly customerRepository: CustomerRepository,
    private readonly heartbeatLog: LogFileWriter,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async execute(): Promise<HeartbeatResponse> {
    const timestamp = formatHeartbeatTimestamp(this.clock());
    const aliveLine = `${timestamp} CRM is alive`;
    await this.heartbeatLog.append(aliveLine);

    let databaseReachable: boolean;
    let pingLine: string;
    try {
      await this.customerRepository.ping();
      databaseReachable = true;
      pingLine = `${timestamp} Database ping: ok`;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      Logger.warn("Heartbeat database ping failed", { reason });
      databaseReachable = false;
      pingLine = `${timestamp} Database ping failed: ${reason}`;
    }
    await this.heartbeatLog.append(pingLine);

    Logger.debug("Heartbeat recorded", { databaseReachable, logPath: this.heartbeatLog.path });

    return { databaseReachable, lines: [aliveLine, pingLine] };
  }
}
