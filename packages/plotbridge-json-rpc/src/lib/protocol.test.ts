import { describe, it, expect } from '@effect/vitest';
import { Effect, Either, Option, pipe } from 'effect';
import {
  ErrorCode,
  Inbound,
  classify,
  encodeError,
  encodeNotification,
  encodeRequest,
  encodeSuccess,
} from './protocol';

describe('classify', () => {
  it('reports text that is not JSON as malformed', () => {
    expect(classify('{oops')._tag).toBe('Malformed');
  });

  it('recognises a success response', () => {
    const inbound = classify('{"jsonrpc":"2.0","id":3,"result":{"ok":true}}');

    expect(Inbound.$is('Response')(inbound)).toBe(true);
    if (Inbound.$is('Response')(inbound)) {
      expect(inbound.id).toBe(3);
      expect(inbound.outcome).toEqual(Either.right({ ok: true }));
    }
  });

  it('recognises an error response', () => {
    const inbound = classify(
      '{"jsonrpc":"2.0","id":4,"error":{"code":-32601,"message":"Method not found: x","data":null}}'
    );

    expect(Inbound.$is('Response')(inbound)).toBe(true);
    if (Inbound.$is('Response')(inbound)) {
      expect(inbound.outcome).toEqual(
        Either.left({ code: -32601, message: 'Method not found: x', data: null })
      );
    }
  });

  it('treats a message without id as a notification with null params', () => {
    const inbound = classify('{"jsonrpc":"2.0","method":"evt"}');

    expect(inbound).toEqual(Inbound.Notification({ method: 'evt', params: null }));
  });

  it('treats a message with id as a request', () => {
    const inbound = classify('{"jsonrpc":"2.0","method":"echo","params":[1,2],"id":"a"}');

    expect(inbound).toEqual(Inbound.Request({ id: 'a', method: 'echo', params: [1, 2] }));
  });

  it('keeps an explicit null id as a request', () => {
    const inbound = classify('{"jsonrpc":"2.0","method":"echo","id":null}');

    expect(inbound).toEqual(Inbound.Request({ id: null, method: 'echo', params: null }));
  });

  it('echoes the id of an invalid request', () => {
    const inbound = classify('{"jsonrpc":"1.0","method":"m","id":5}');

    expect(inbound).toEqual(Inbound.Invalid({ id: Option.some(5) }));
  });

  it('answers an unusable id with null', () => {
    const inbound = classify('{"jsonrpc":"2.0","method":7,"id":{"x":1}}');

    expect(inbound).toEqual(Inbound.Invalid({ id: Option.some(null) }));
  });

  it('drops an invalid message that has no id', () => {
    expect(classify('{"method":"m"}')).toEqual(Inbound.Invalid({ id: Option.none() }));
    expect(classify('[1,2,3]')).toEqual(Inbound.Invalid({ id: Option.none() }));
  });
});

describe('encoders', () => {
  it.effect('writes a request with null params when none are given', () =>
    pipe(
      encodeRequest(1, 'ping', undefined),
      Effect.map((frame) =>
        expect(frame).toBe('{"jsonrpc":"2.0","method":"ping","params":null,"id":1}')
      )
    )
  );

  it.effect('writes a notification without an id', () =>
    pipe(
      encodeNotification('evt', { x: 1 }),
      Effect.map((frame) => expect(frame).toBe('{"jsonrpc":"2.0","method":"evt","params":{"x":1}}'))
    )
  );

  it.effect('writes an undefined result as null', () =>
    pipe(
      encodeSuccess(7, undefined),
      Effect.map((frame) => expect(frame).toBe('{"jsonrpc":"2.0","id":7,"result":null}'))
    )
  );

  it.effect('always includes error data', () =>
    pipe(
      encodeError(null, { code: ErrorCode.PARSE_ERROR, message: 'Parse error: x' }),
      Effect.map((frame) =>
        expect(frame).toBe(
          '{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error: x","data":null}}'
        )
      )
    )
  );

  it.effect('fails to encode values JSON cannot represent', () =>
    pipe(
      encodeRequest(2, 'big', 10n),
      Effect.flip,
      Effect.map((error) => expect(error.message.startsWith('Cannot encode message')).toBe(true))
    )
  );

  it.effect('fails a result JSON would leave out of the frame', () =>
    pipe(
      encodeSuccess(3, () => 1),
      Effect.flip,
      Effect.map((error) =>
        expect(error.message).toBe('Cannot encode message: value has no JSON representation')
      )
    )
  );

  it.effect('fails params whose toJSON yields nothing', () =>
    pipe(
      encodeNotification('evt', { toJSON: () => undefined }),
      Effect.flip,
      Effect.map((error) =>
        expect(error.message).toBe('Cannot encode message: value has no JSON representation')
      )
    )
  );

  it.effect('replaces error data JSON cannot represent with null', () =>
    pipe(
      encodeError(4, { code: ErrorCode.SERVER_ERROR, message: 'Busy', data: Symbol('busy') }),
      Effect.map((frame) =>
        expect(frame).toBe(
          '{"jsonrpc":"2.0","id":4,"error":{"code":-32000,"message":"Busy","data":null}}'
        )
      )
    )
  );
});
