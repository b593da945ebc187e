import { deps, Singleton } from "graphwire/runtime";
import { Clock } from "./tokens";

export interface AuditEntry {
  at: Date;
  event: string;
  detail: string;
}

@Singleton(deps(Clock))
export class AuditLog {
  private readonly entries: AuditEntry[] = [];

  constructor(private readonly now: () => Date) {}

  record(event: string, detail: string): void {
    this.entries.push({ at: this.now(), event, detail });
  }

  list(): AuditEntry[] {
    return [...this.entries];
  }
}
