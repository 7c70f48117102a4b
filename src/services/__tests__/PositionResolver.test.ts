import { createFakeDecoder } from '../../__tests__/fixtures/decoderFixtures';
import { PositionResolver, createCprTrackingState } from '../PositionResolver';
import logger from '../../utils/logger';

jest.mock('../../utils/logger', () => ({
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
}));

const OPTIONS = { staleSeconds: 10, failureLogSeconds: 30, reference: null };

describe('PositionResolver', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('waits for both parities', () => {
    const { decoder, resolvePosition } = createFakeDecoder();
    const resolver = new PositionResolver(decoder, OPTIONS);
    const state = createCprTrackingState();

    expect(resolver.resolve('ABC123', state, 'EVEN', 100)).toEqual({ status: 'pending' });
    expect(state.slots.even).toEqual({ parity: 'even', frame: 'EVEN', timestamp: 100 });
    expect(resolvePosition).not.toHaveBeenCalled();
  });

  it('resolves a fresh pair and passes both timestamps to the decoder', () => {
    const { decoder, resolvePosition } = createFakeDecoder();
    const resolver = new PositionResolver(decoder, { ...OPTIONS, reference: { lat: 5, lon: 6 } });
    const state = createCprTrackingState();

    resolver.resolve('ABC123', state, 'EVEN', 100);
    const outcome = resolver.resolve('ABC123', state, 'ODD', 104);

    expect(outcome).toEqual({ status: 'resolved', position: { lat: 1, lon: 2 } });
    expect(resolvePosition).toHaveBeenCalledWith('EVEN', 'ODD', 100, 104, { lat: 5, lon: 6 });
  });

  it('treats a delta of exactly the threshold as fresh', () => {
    const { decoder } = createFakeDecoder();
    const resolver = new PositionResolver(decoder, OPTIONS);
    const state = createCprTrackingState();

    resolver.resolve('ABC123', state, 'EVEN', 100);
    expect(resolver.resolve('ABC123', state, 'ODD', 110).status).toBe('resolved');
  });

  it('discards the older half of a stale pair', () => {
    const { decoder, resolvePosition } = createFakeDecoder();
    const resolver = new PositionResolver(decoder, OPTIONS);
    const state = createCprTrackingState();

    resolver.resolve('ABC123', state, 'EVEN', 100);
    const outcome = resolver.resolve('ABC123', state, 'ODD', 115);

    expect(outcome).toEqual({ status: 'stale', deltaSeconds: 15, counted: true });
    expect(state.slots.even).toBeNull();
    expect(state.slots.odd).toEqual({ parity: 'odd', frame: 'ODD', timestamp: 115 });
    expect(resolvePosition).not.toHaveBeenCalled();
  });

  it('does not count the same stale pair twice', () => {
    const { decoder } = createFakeDecoder();
    const resolver = new PositionResolver(decoder, OPTIONS);
    const state = createCprTrackingState();

    resolver.resolve('ABC123', state, 'EVEN', 100);
    resolver.resolve('ABC123', state, 'ODD', 115);

    expect(resolver.resolve('ABC123', state, 'ODD', 115)).toEqual({ status: 'duplicate' });
    expect(resolver.resolve('ABC123', state, 'EVEN', 100)).toEqual({ status: 'stale', deltaSeconds: 15, counted: false });
  });

  it('reports a duplicate frame without decoding again', () => {
    const { decoder, resolvePosition } = createFakeDecoder();
    const resolver = new PositionResolver(decoder, OPTIONS);
    const state = createCprTrackingState();

    resolver.resolve('ABC123', state, 'EVEN', 100);
    resolver.resolve('ABC123', state, 'ODD', 104);
    expect(resolver.resolve('ABC123', state, 'ODD', 104)).toEqual({ status: 'duplicate' });
    expect(resolvePosition).toHaveBeenCalledTimes(1);
  });

  it('keeps both slots when decoding fails and throttles the failure log', () => {
    const { decoder } = createFakeDecoder(undefined, null);
    const resolver = new PositionResolver(decoder, OPTIONS);
    const state = createCprTrackingState();

    resolver.resolve('ABC123', state, 'EVEN', 100);
    expect(resolver.resolve('ABC123', state, 'ODD', 101)).toEqual({ status: 'failed' });
    expect(resolver.resolve('ABC123', state, 'EVEN', 102)).toEqual({ status: 'failed' });
    expect(state.slots.even?.timestamp).toBe(102);
    expect(state.slots.odd?.timestamp).toBe(101);

    // 125 pairs stale with 101; 132 then pairs with 125 inside the window
    expect(resolver.resolve('ABC123', state, 'EVEN', 125)).toEqual({ status: 'stale', deltaSeconds: 24, counted: true });
    expect(resolver.resolve('ABC123', state, 'ODD', 132)).toEqual({ status: 'failed' });

    expect(state.slots.even?.timestamp).toBe(125);
    expect(state.slots.odd?.timestamp).toBe(132);
    // 102 and 125 fall inside the window opened at 101
    expect(logger.debug).toHaveBeenCalledTimes(2);
    expect(logger.debug).toHaveBeenNthCalledWith(1, 'Failed to resolve CPR position', { address: 'ABC123' });
    expect(logger.debug).toHaveBeenNthCalledWith(2, 'Failed to resolve CPR position', { address: 'ABC123' });
    expect(state.lastFailureLogAt).toBe(132);
  });

  it('ignores frames without a parity', () => {
    const { decoder } = createFakeDecoder();
    const resolver = new PositionResolver(decoder, OPTIONS);
    const state = createCprTrackingState();

    expect(resolver.resolve('ABC123', state, 'VELOCITY', 100)).toEqual({ status: 'pending' });
    expect(state.slots).toEqual({ even: null, odd: null });
  });
});
