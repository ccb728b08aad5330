export class TimerConfigurationError extends Error {
  constructor(
    readonly variant: string,
    readonly field: string,
    message: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
