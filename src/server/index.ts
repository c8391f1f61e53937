/**
 * @package bfkit debug server
 *
 * PUBLIC API for the debug server.
 *
 * TYPES (for consumers):
 *   - IDebugService         - The service interface contract
 *   - MachineSnapshot       - Full machine state at a point in time
 *   - StepResult            - Result of stepping execution
 *   - Breakpoint            - Breakpoint configuration
 *   - SessionConfig         - Session creation options
 *   - ServerEvent           - WebSocket events (server -> client)
 *   - ClientCommand         - WebSocket commands (client -> server)
 *
 * IMPLEMENTATION (for running the server):
 *   - DebugServer           - The HTTP/WebSocket server
 *   - DebugSession          - One steppable session, usable without a server
 *   - startDebugServer()    - Quick start function
 */

// ============================================================
// PUBLIC TYPE EXPORTS - The Contract
// ============================================================

export type {
  IDebugService,
  SessionConfig,
  SessionStatus,
  SessionSummary,
  MachineSnapshot,
  StepResult,
  LoadResult,
  Breakpoint,
  BreakpointSpec,
  ServerEvent,
  ClientCommand,
} from './debugService';

// ============================================================
// PUBLIC CLASS EXPORTS - The Implementation
// ============================================================

export { DebugServer, parseClientCommand, parseBreakpointSpec } from './debugServer';
export { DebugSession } from './debugSession';

// ============================================================
// CONVENIENCE FUNCTIONS
// ============================================================

import { DebugServer } from './debugServer';

/**
 * Start a debug server on the specified port.
 *
 * @example
 * ```typescript
 * import { startDebugServer } from 'bfkit/server';
 *
 * const server = await startDebugServer(3456);
 * // Server now running at http://localhost:3456
 * // WebSocket at ws://localhost:3456/ws?session=<id>
 * ```
 */
export async function startDebugServer(port = 3456): Promise<DebugServer> {
  const server = new DebugServer(port);
  await server.start();
  return server;
}

// ============================================================
// API DOCUMENTATION
// ============================================================

/**
 * # bfkit Debug Server API
 *
 * ## REST Endpoints
 *
 * ### Session Management
 * - POST   /session              - Create new session (body: SessionConfig)
 * - GET    /sessions             - List all sessions
 * - GET    /session/:id          - Get session info
 * - DELETE /session/:id          - Close session
 *
 * ### Code Execution
 * - POST   /session/:id/load     - Load program (body: { code: string, input?: string })
 * - POST   /session/:id/step     - Execute single operator
 * - POST   /session/:id/step/:n  - Execute N operators
 * - POST   /session/:id/continue - Run until breakpoint/input/done
 * - POST   /session/:id/input    - Feed `,` (body: { text?: string, end?: boolean })
 *
 * ### State Inspection
 * - GET    /session/:id/snapshot - Get current machine state
 *
 * ### Breakpoints
 * - POST   /session/:id/breakpoint      - Add (body: { type: 'offset' | 'operator', offset?, operator? })
 * - DELETE /session/:id/breakpoint/:id  - Remove breakpoint
 * - GET    /session/:id/breakpoints     - List breakpoints
 *
 * ## WebSocket Protocol
 *
 * Connect to: ws://localhost:PORT/ws?session=SESSION_ID
 *
 * ### Server Events (ServerEvent)
 * - { type: 'snapshot', snapshot }
 * - { type: 'breakpointHit', breakpointId, snapshot }
 * - { type: 'awaitingInput', snapshot }
 * - { type: 'done', output, snapshot }
 * - { type: 'error', error: { message }, snapshot? }
 *
 * ### Client Commands (ClientCommand)
 * - { type: 'load', code, input? }
 * - { type: 'step' }
 * - { type: 'stepN', n }
 * - { type: 'continue' }
 * - { type: 'input', text?, end? }
 * - { type: 'addBreakpoint', breakpoint: {...} }
 * - { type: 'removeBreakpoint', breakpointId }
 */
