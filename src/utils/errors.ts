export class ValidationError extends Error {
  field: string;
  issues: string[];

  constructor(args: { message: string; field: string; issues?: string[] }) {
    super(args.message);
    this.name = 'ValidationError';
    this.field = args.field;
    this.issues = args.issues ?? [args.message];
  }
}

export class ConfigurationError extends Error {
  setting: string;

  constructor(args: { message: string; setting: string }) {
    super(args.message);
    this.name = 'ConfigurationError';
    this.setting = args.setting;
  }
}
