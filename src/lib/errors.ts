export class ConfigError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.missing = missing;
  }
}

export class ReportFetchError extends Error {
  readonly status: number | null;
  readonly body: string;

  constructor(message: string, status: number | null, body = "") {
    super(message);
    this.name = "ReportFetchError";
    this.status = status;
    this.body = body;
  }
}

export type LoadPhase = "delete" | "validate" | "append" | "read";

export class LoadError extends Error {
  readonly table: string;
  readonly phase: LoadPhase;
  readonly status: number | null;

  constructor(table: string, phase: LoadPhase, message: string, status: number | null = null) {
    super(`Load into ${table} failed during ${phase}: ${message}`);
    this.name = "LoadError";
    this.table = table;
    this.phase = phase;
    this.status = status;
  }
}
