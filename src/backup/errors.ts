export class BackupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends BackupError {}

export class AlreadyBackedUpError extends BackupError {
  readonly context: string;
  readonly path: string;

  constructor(context: string, path: string) {
    super(`File '${path}' is already backed up in context '${context}'.`);
    this.context = context;
    this.path = path;
  }
}

export class IllegalReuseError extends BackupError {}

export class NotRegisteredError extends BackupError {}

export class InvalidStateError extends BackupError {}
