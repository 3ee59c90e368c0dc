import { DataSource, Repository } from "typeorm";
import { ErrorLog } from "../entities/ErrorLog";
import type { ArtifactFamily } from "../wallet/families";

/** Diagnostics Wallet posts to /log. Written here, never read back by the service. */
export class ErrorLogService {
  private readonly logs: Repository<ErrorLog>;

  constructor(dataSource: DataSource, private readonly family: ArtifactFamily) {
    this.logs = dataSource.getRepository(ErrorLog);
  }

  async record(messages: string[]): Promise<ErrorLog[]> {
    return this.logs.save(messages.map((message) => this.logs.create({ family: this.family, message })));
  }
}
