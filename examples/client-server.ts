/**
 * Example: Client and Server in one process
 *
 * Builds requests with RpcClient, answers them with RpcServer and resolves the replies.
 * Run with RPCWIRE_MODE=canonical to see standard JSON-RPC 2.0 envelopes.
 */

import { z } from 'zod';
import { ConsoleLogger, RpcClient, RpcError, RpcServer, methodVariant } from '../src';

const MyMethods = z.discriminatedUnion('method', [
  methodVariant('test', z.object({}).strict()),
  methodVariant('hello', z.object({ name: z.string() }).strict()),
  methodVariant('list', z.object({ i: z.string() }).strict()),
  methodVariant('complicated', z.object({}).strict()),
]);
type MyMethod = z.output<typeof MyMethods>;

const MyResult = z.union([z.object({ ok: z.boolean() }).strict(), z.string()]);
type MyResult = z.output<typeof MyResult>;

const logger = new ConsoleLogger('info');

const server = new RpcServer<MyMethod, MyResult>({
  methods: MyMethods,
  logger,
  handler: (call) => {
    switch (call.method) {
      case 'test':
        return { ok: true };
      case 'hello':
        return `Hello, ${call.params.name}`;
      case 'list':
        return `List, ${call.params.i}`;
      case 'complicated':
        throw RpcError.custom(-32000, 'Complicated method not implemented');
    }
  },
});

const client = new RpcClient<MyMethod, MyResult>({ resultSchema: MyResult, logger });

const decoder = new TextDecoder();

function roundTrip(call: MyMethod): void {
  const pending = client.request(call);
  console.log('request payload:', decoder.decode(pending.payload));

  const reply = server.handlePayload(pending.payload, 'local');
  if (reply === undefined) {
    console.log('no response');
    return;
  }
  console.log('response:', decoder.decode(reply));
  console.log('outcome:', pending.tryHandleResponse(reply));
}

// ============================================================================
// Calls answered with a result
// ============================================================================
roundTrip({ method: 'test', params: {} });
roundTrip({ method: 'hello', params: { name: 'world' } });

// ============================================================================
// Call answered with an application error
// ============================================================================
roundTrip({ method: 'complicated', params: {} });

// ============================================================================
// Hand-written payload with params the method does not declare
// ============================================================================
const invalidParams = '{"jsonrpc":"2.0","id":3,"method":"test","params":{"abc": 123}}';
console.log('request payload:', invalidParams);
const reply = server.handlePayload(new TextEncoder().encode(invalidParams), 'local');
console.log('response:', reply === undefined ? 'none' : decoder.decode(reply));
