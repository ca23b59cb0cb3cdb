import { addLogListener, getLogLevel, logger, setLogLevel, type LogEntry } from '../logger'

describe('logger', () => {
  const initial = getLogLevel()

  afterEach(() => {
    setLogLevel(initial)
    jest.restoreAllMocks()
  })

  test('drops entries below the minimum level', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {})
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => {})
    setLogLevel('info')
    logger.debug('merge', 'collapsed')
    logger.warn('merge', 'clamped', { entryId: 'r1' })
    expect(debug).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledWith('[fieldplan:merge] clamped', { entryId: 'r1' })
  })

  test('listeners receive entries until they unsubscribe', () => {
    jest.spyOn(console, 'error').mockImplementation(() => {})
    setLogLevel('debug')
    const seen: LogEntry[] = []
    const unsubscribe = addLogListener((entry) => seen.push(entry))
    logger.error('refresh', 'failed')
    unsubscribe()
    logger.error('refresh', 'failed again')
    expect(seen.map((e) => [e.level, e.category, e.message])).toEqual([['error', 'refresh', 'failed']])
  })

  test('silent suppresses everything', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => {})
    setLogLevel('silent')
    logger.error('plan', 'nothing to see')
    expect(error).not.toHaveBeenCalled()
  })
})
