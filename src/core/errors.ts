export class DeskError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message?: string
  ) {
    super(message ?? code);
    this.name = new.target.name;
  }
}

export class NotFoundError extends DeskError {
  constructor(public readonly ticketId: string) {
    super(404, "not_found", `Ticket not found: ${ticketId}`);
  }
}

export class TerminalStateError extends DeskError {
  constructor(public readonly ticketId: string, public readonly current: string) {
    super(409, "terminal_state", `Ticket ${ticketId} is ${current} and can no longer change`);
  }
}

export class InvalidTransitionError extends DeskError {
  constructor(public readonly from: string, public readonly to: string) {
    super(409, "invalid_transition", `Cannot move a ticket from ${from} to ${to}`);
  }
}

export class DuplicateIngestionError extends DeskError {
  constructor(public readonly fingerprint: string, public readonly existingId: string) {
    super(409, "duplicate_ingestion", `Message already ingested as ${existingId}`);
  }
}

export class AdapterError extends DeskError {
  constructor(public readonly adapter: string, message: string, options?: { cause?: unknown }) {
    super(502, "adapter_failure", `${adapter}: ${message}`);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
