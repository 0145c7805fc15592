// Console logger, silent unless debugging is switched on.

const Level = {
  Debug: "debug",
  Log: "log",
  Info: "info",
  Warn: "warn",
  Error: "error",
} as const;

export class Logify {
  #name: string;
  readonly opts: Required<Logify.Constructor>;

  #log(method: Logify.Method, ...msg: unknown[]) {
    if (this.opts.debug) console[method](this.#name, ...msg);
  }

  log = this.#log.bind(this, Level.Log);
  info = this.#log.bind(this, Level.Info);
  warn = this.#log.bind(this, Level.Warn);
  debug = this.#log.bind(this, Level.Debug);
  error = this.#log.bind(this, Level.Error);

  constructor(name: string, opts: Logify.Constructor = {}) {
    this.#name = `${name}:`;
    this.opts = { debug: opts.debug ?? false };
  }
}

export namespace Logify {
  export type Method = (typeof Level)[keyof typeof Level];

  export interface Constructor {
    debug?: boolean;
  }
}
