import logger, { consoleLine, setProcessRole } from '../logger';

const render = (info: Record<string, unknown>): unknown => {
  const out = consoleLine.transform({ level: 'info', message: '', ...info }, {});
  return typeof out === 'object' ? out[Symbol.for('message')] : null;
};

describe('logger', () => {
  it('renders the role prefix and remaining metadata on one line', () => {
    expect(render({
      timestamp: '2026-01-01T00:00:00.000Z',
      message: 'Subscriber started',
      service: 'adsb-pipeline',
      role: 'subscriber',
      queueDriver: 'memory',
    })).toBe('2026-01-01T00:00:00.000Z [subscriber] info: Subscriber started {"queueDriver":"memory"}');
  });

  it('omits the prefix and metadata when there are none', () => {
    expect(render({ timestamp: '2026-01-01T00:00:00.000Z', message: 'Broadcast publisher stopped' }))
      .toBe('2026-01-01T00:00:00.000Z info: Broadcast publisher stopped');
  });

  it('tags later entries with the process role', () => {
    setProcessRole('publisher');

    expect(logger.defaultMeta).toEqual({ service: 'adsb-pipeline', role: 'publisher' });
  });
});
