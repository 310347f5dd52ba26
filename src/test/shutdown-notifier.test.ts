import { EventEmitter } from 'events'
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { ProcessShutdownNotifier } from '../services/shutdown-notifier.js'

describe('ProcessShutdownNotifier', () => {
  let signals: EventEmitter

  beforeEach(() => {
    signals = new EventEmitter()
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('runs handlers in subscription order on a signal', async () => {
    const onComplete = vi.fn()
    const notifier = new ProcessShutdownNotifier({ source: signals, onComplete })
    const calls: string[] = []
    notifier.subscribe(async () => {
      await Promise.resolve()
      calls.push('release')
    })
    notifier.subscribe(() => {
      calls.push('close')
    })
    notifier.listen()

    signals.emit('SIGINT', 'SIGINT')
    await notifier.trigger()

    expect(calls).toEqual(['release', 'close'])
    expect(onComplete).toHaveBeenCalledWith('SIGINT')
  })

  it('keeps running later handlers after one fails', async () => {
    const notifier = new ProcessShutdownNotifier({ source: signals })
    const later = vi.fn()
    notifier.subscribe(() => {
      throw new Error('handler failed')
    })
    notifier.subscribe(later)

    await notifier.trigger()

    expect(later).toHaveBeenCalledTimes(1)
    expect(console.error).toHaveBeenCalledTimes(1)
  })

  it('runs handlers only once across repeated signals', async () => {
    const onComplete = vi.fn()
    const notifier = new ProcessShutdownNotifier({ source: signals, onComplete })
    const handler = vi.fn()
    notifier.subscribe(handler)
    notifier.listen()

    signals.emit('SIGTERM', 'SIGTERM')
    signals.emit('SIGINT', 'SIGINT')
    await notifier.trigger()
    await notifier.trigger()

    expect(handler).toHaveBeenCalledTimes(1)
    expect(onComplete).toHaveBeenCalledTimes(1)
    expect(notifier.isShuttingDown()).toBe(true)
  })

  it('does not call unsubscribed handlers', async () => {
    const notifier = new ProcessShutdownNotifier({ source: signals })
    const handler = vi.fn()
    const unsubscribe = notifier.subscribe(handler)

    unsubscribe()
    await notifier.trigger()

    expect(handler).not.toHaveBeenCalled()
  })

  it('detaches its signal listeners', async () => {
    const notifier = new ProcessShutdownNotifier({ source: signals })
    notifier.listen()
    notifier.listen()
    expect(signals.listenerCount('SIGINT')).toBe(1)
    expect(signals.listenerCount('SIGTERM')).toBe(1)

    notifier.close()

    expect(signals.listenerCount('SIGINT')).toBe(0)
    expect(signals.listenerCount('SIGTERM')).toBe(0)
  })

  it('detaches after the shutdown sequence', async () => {
    const notifier = new ProcessShutdownNotifier({ source: signals, signals: ['SIGHUP'] })
    notifier.listen()
    expect(signals.listenerCount('SIGHUP')).toBe(1)

    await notifier.trigger('SIGHUP')

    expect(signals.listenerCount('SIGHUP')).toBe(0)
  })
})
