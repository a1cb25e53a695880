export class SlicerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SlicerError";
  }
}

export class UnrecognizedPluginSpecError extends SlicerError {
  constructor(readonly spec: unknown) {
    super(`Don't know how to handle ${describeSpec(spec)}`);
    this.name = "UnrecognizedPluginSpecError";
  }
}

export class AttributeNotFoundError extends SlicerError {
  constructor(
    readonly pluginName: string,
    readonly className: string,
    readonly attribute: string,
  ) {
    super(`Attribute '${attribute}' not found on ${pluginName}/${className}`);
    this.name = "AttributeNotFoundError";
  }
}

export class ConfigError extends SlicerError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ParserError extends SlicerError {
  constructor(message: string) {
    super(message);
    this.name = "ParserError";
  }
}

function describeSpec(spec: unknown): string {
  if (Array.isArray(spec)) return `array of length ${spec.length}`;
  if (spec === null) return "null";
  if (typeof spec === "object") return `object ${spec.constructor?.name ?? "(no prototype)"}`;
  return `${typeof spec} ${String(spec)}`;
}
