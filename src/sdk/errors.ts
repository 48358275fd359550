export class LiveInputError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LiveInputError';
  }
}

export class LiveTransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LiveTransportError';
  }
}

export class LiveSessionClosedError extends LiveTransportError {
  constructor() {
    super('Live session is closed.');
    this.name = 'LiveSessionClosedError';
  }
}
