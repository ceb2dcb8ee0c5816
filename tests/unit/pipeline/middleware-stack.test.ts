/**
 * @fileoverview Unit tests for middleware stack folding
 */

import {
  compose,
  createMiddleware,
  createRequest,
  createStack,
  MiddlewareStack,
  RequestHandler,
  ResponseRecorder,
  Wrapper,
} from '../../../src';

function tracing(label: string, events: string[]): Wrapper {
  return (next) => async (request, response) => {
    events.push(`${label}:before`);
    await next(request, response);
    events.push(`${label}:after`);
  };
}

function endpoint(events: string[]): RequestHandler {
  return (_request, response) => {
    events.push('handler');
    response.end('done');
  };
}

describe('Middleware stack', () => {
  // ============================================================================
  // TEST GROUP 1: createStack
  // ============================================================================

  describe('createStack', () => {
    it('should run wrappers outermost-first around the handler', async () => {
      const events: string[] = [];
      const handler = createStack([tracing('m1', events), tracing('m2', events)])(
        endpoint(events),
      );

      await handler(createRequest(), new ResponseRecorder());

      expect(events).toEqual(['m1:before', 'm2:before', 'handler', 'm2:after', 'm1:after']);
    });

    it('should return the handler unchanged for an empty stack', () => {
      const inner: RequestHandler = () => undefined;

      expect(createStack([])(inner)).toBe(inner);
    });

    it('should snapshot the wrapper list', async () => {
      const events: string[] = [];
      const wrappers = [tracing('m1', events)];
      const stack = createStack(wrappers);
      wrappers.push(tracing('late', events));

      await stack(endpoint(events))(createRequest(), new ResponseRecorder());

      expect(events).toEqual(['m1:before', 'handler', 'm1:after']);
    });

    it('should let a wrapper short-circuit the chain', async () => {
      const events: string[] = [];
      const reject: Wrapper = () => (_request, response) => {
        events.push('rejected');
        response.writeHead(401);
        response.end('unauthorized');
      };
      const response = new ResponseRecorder();

      await createStack([tracing('outer', events), reject, tracing('inner', events)])(
        endpoint(events),
      )(createRequest(), response);

      expect(events).toEqual(['outer:before', 'rejected', 'outer:after']);
      expect(response.statusCode).toBe(401);
      expect(response.body).toBe('unauthorized');
    });
  });

  // ============================================================================
  // TEST GROUP 2: MiddlewareStack
  // ============================================================================

  describe('MiddlewareStack', () => {
    it('should accept wrappers and object-style middleware', async () => {
      const events: string[] = [];
      const stack = new MiddlewareStack()
        .use(tracing('fn', events))
        .use(
          createMiddleware(async (request, response, next) => {
            events.push('object');
            await next(request, response);
          }),
        );

      await stack.wrap(endpoint(events))(createRequest(), new ResponseRecorder());

      expect(stack.length).toBe(2);
      expect(events).toEqual(['fn:before', 'object', 'handler', 'fn:after']);
    });

    it('should add middleware conditionally', () => {
      const stack = new MiddlewareStack()
        .useIf(false, tracing('skipped', []))
        .useIf(() => true, tracing('kept', []));

      expect(stack.length).toBe(1);
    });

    it('should return a copy from build()', () => {
      const stack = new MiddlewareStack().use(tracing('a', []));
      const built = stack.build();
      built.push(tracing('b', []));

      expect(stack.length).toBe(1);
      expect(built).toHaveLength(2);
    });
  });

  // ============================================================================
  // TEST GROUP 3: compose
  // ============================================================================

  describe('compose', () => {
    it('should compose mixed middleware into one wrapper', async () => {
      const events: string[] = [];
      const header = createMiddleware((request, response, next) => {
        response.setHeader('X-Composed', 'yes');
        return next(request, response);
      });
      const response = new ResponseRecorder();

      await compose(tracing('a', events), header)(endpoint(events))(createRequest(), response);

      expect(events).toEqual(['a:before', 'handler', 'a:after']);
      expect(response.getHeader('x-composed')).toBe('yes');
      expect(response.body).toBe('done');
    });
  });
});
