export type ShutdownHandler = () => void | Promise<void>
export type Unsubscribe = () => void

/**
 * Tells subscribers that the process is shutting down gracefully
 */
export interface ShutdownNotifier {
  subscribe(handler: ShutdownHandler): Unsubscribe
}

/**
 * Where termination signals come from. `process` satisfies it.
 */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown
}

export interface ProcessShutdownNotifierOptions {
  signals?: NodeJS.Signals[]
  source?: SignalSource
  /** Called after every handler has run (e.g. to exit the process) */
  onComplete?: (signal: NodeJS.Signals | undefined) => void
}

/**
 * Shutdown notifier driven by process signals.
 * Handlers run once, in subscription order, each awaited before the next.
 * A failing handler is logged and does not keep later handlers from running.
 */
export class ProcessShutdownNotifier implements ShutdownNotifier {
  private handlers: ShutdownHandler[] = []
  private signals: NodeJS.Signals[]
  private source: SignalSource
  private onComplete?: (signal: NodeJS.Signals | undefined) => void
  private listening = false
  private shutdownPromise: Promise<void> | null = null

  constructor(options: ProcessShutdownNotifierOptions = {}) {
    this.signals = options.signals ?? ['SIGINT', 'SIGTERM']
    this.source = options.source ?? process
    this.onComplete = options.onComplete
  }

  subscribe(handler: ShutdownHandler): Unsubscribe {
    this.handlers.push(handler)
    return () => {
      this.handlers = this.handlers.filter(h => h !== handler)
    }
  }

  /**
   * Start listening for termination signals
   */
  listen(): void {
    if (this.listening) return
    for (const signal of this.signals) {
      this.source.on(signal, this.handleSignal)
    }
    this.listening = true
  }

  /**
   * Stop listening for termination signals
   */
  close(): void {
    if (!this.listening) return
    for (const signal of this.signals) {
      this.source.off(signal, this.handleSignal)
    }
    this.listening = false
  }

  /**
   * Run the shutdown sequence. Later calls return the first run's promise.
   */
  trigger(signal?: NodeJS.Signals): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runHandlers(signal)
    }
    return this.shutdownPromise
  }

  isShuttingDown(): boolean {
    return this.shutdownPromise !== null
  }

  getSubscriberCount(): number {
    return this.handlers.length
  }

  private handleSignal = (signal: NodeJS.Signals): void => {
    if (this.shutdownPromise) {
      console.log(`\nReceived ${signal} again, shutdown already in progress`)
      return
    }
    console.log(`\nReceived ${signal}, shutting down gracefully...`)
    this.trigger(signal).catch((error) => {
      console.error('[ShutdownNotifier] Shutdown sequence failed:', error)
    })
  }

  private async runHandlers(signal: NodeJS.Signals | undefined): Promise<void> {
    const handlers = [...this.handlers]
    this.handlers = []

    for (const handler of handlers) {
      try {
        await handler()
      } catch (error) {
        console.error('[ShutdownNotifier] Shutdown handler failed:', error)
      }
    }

    this.close()
    this.onComplete?.(signal)
  }
}
