import { describe, expect, it } from 'vitest'
import { RecordingNotifier } from '../../../__tests__/helpers.js'
import { CompositeNotifier, LogNotifier, combineNotifiers } from '../composite.js'
import { NotificationDispatcher } from '../dispatcher.js'

describe('NotificationDispatcher', () => {
  it('returns true once the notifier delivered', async () => {
    const notifier = new RecordingNotifier()
    const dispatcher = new NotificationDispatcher(notifier)

    expect(await dispatcher.send('hello')).toBe(true)
    expect(notifier.messages).toEqual(['hello'])
  })

  it('swallows delivery failures and reports false', async () => {
    const notifier = new RecordingNotifier()
    notifier.failWith = new Error('channel down')
    const dispatcher = new NotificationDispatcher(notifier)

    expect(await dispatcher.send('hello')).toBe(false)
  })
})

describe('CompositeNotifier', () => {
  it('succeeds when at least one channel delivered', async () => {
    const working = new RecordingNotifier()
    const broken = new RecordingNotifier()
    broken.failWith = new Error('down')

    await new CompositeNotifier([broken, working]).send('hello')

    expect(working.messages).toEqual(['hello'])
  })

  it('fails when every channel failed', async () => {
    const first = new RecordingNotifier()
    const second = new RecordingNotifier()
    first.failWith = new Error('down')
    second.failWith = new Error('also down')

    await expect(new CompositeNotifier([first, second]).send('hello')).rejects.toThrow('All notification channels failed')
  })
})

describe('combineNotifiers', () => {
  it('falls back to logging when nothing is configured', () => {
    expect(combineNotifiers([])).toBeInstanceOf(LogNotifier)
  })

  it('uses a single notifier directly', () => {
    const only = new RecordingNotifier()
    expect(combineNotifiers([only])).toBe(only)
  })

  it('fans out to several notifiers', () => {
    expect(combineNotifiers([new RecordingNotifier(), new RecordingNotifier()])).toBeInstanceOf(CompositeNotifier)
  })
})
