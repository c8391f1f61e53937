/**
 * Debug Service - Contract for stepping an interpreter session remotely
 *
 * Everything the machine holds is plain data (tape, two pointers, a cursor,
 * the program buffer), so a snapshot is a direct copy of it. The server
 * exposes that through REST for control and a WebSocket for live updates.
 */

// ============================================================
// SERVICE TYPES - What the UI receives (JSON-serializable)
// ============================================================

export type SessionStatus = 'idle' | 'paused' | 'awaiting-input' | 'done' | 'error';

/**
 * Complete machine state at a point in time
 */
export interface MachineSnapshot {
  /** Steps executed since the last load */
  step: number;
  status: SessionStatus;

  /** Instruction pointer */
  ip: number;
  /** The byte at the instruction pointer, if any */
  op?: string;
  /** Tape pointer */
  tp: number;
  /** Highest tape pointer reached */
  tpMax: number;
  line: number;
  column: number;

  /** Cells 0..tpMax */
  tape: number[];
  programLength: number;

  /** Everything written by `.` so far, latin1-decoded */
  output: string;
  /** Formatted warnings, oldest first */
  warnings: string[];
  /** Text written by `#` */
  dump: string;
  /** Bytes fed but not yet read by `,` */
  inputBuffered: number;
  inputEnded: boolean;

  /** If status is 'error', the error */
  error?: { message: string };
}

/**
 * Breakpoint configuration.
 * `offset` stops before executing the byte at that offset,
 * `operator` stops before any occurrence of that byte.
 */
export interface Breakpoint {
  id: string;
  type: 'offset' | 'operator';
  offset?: number;
  operator?: string;
  enabled: boolean;
}

export type BreakpointSpec = Omit<Breakpoint, 'id' | 'enabled'> & { enabled?: boolean };

/**
 * Session configuration
 */
export interface SessionConfig {
  name?: string;
  tapeSize?: number;
  eofBehavior?: 'zero' | 'decrement' | 'unchanged';
  debug?: boolean;
  specialOps?: boolean;
  /** Max steps per continue before auto-pause */
  maxSteps?: number;
}

/**
 * Step result
 */
export interface StepResult {
  snapshot: MachineSnapshot;
  outcome: 'stepped' | 'breakpoint' | 'awaiting-input' | 'done' | 'error';
  /** If breakpoint hit, which one */
  breakpointId?: string;
}

export type LoadResult = { success: boolean; error?: string };

export type SessionSummary = { id: string; name?: string; step: number; status: SessionStatus };

/**
 * The Debug Service contract
 */
export interface IDebugService {
  // ─────────────────────────────────────────────────────────────
  // Session Management
  // ─────────────────────────────────────────────────────────────

  createSession(config?: SessionConfig): Promise<string>;

  listSessions(): Promise<SessionSummary[]>;

  getSession(sessionId: string): Promise<{ id: string; config: SessionConfig; snapshot: MachineSnapshot }>;

  closeSession(sessionId: string): Promise<void>;

  // ─────────────────────────────────────────────────────────────
  // Code Execution
  // ─────────────────────────────────────────────────────────────

  /** Load a program (resolve loops, don't run). `input` is pre-supplied to `,`. */
  loadCode(sessionId: string, code: string, input?: string): Promise<LoadResult>;

  step(sessionId: string): Promise<StepResult>;

  stepN(sessionId: string, n: number): Promise<StepResult>;

  /** Continue until breakpoint, pending input, or completion */
  continue(sessionId: string): Promise<StepResult>;

  /** Feed text to `,`; `end` marks end of input */
  provideInput(sessionId: string, text: string, end?: boolean): Promise<MachineSnapshot>;

  // ─────────────────────────────────────────────────────────────
  // State Inspection
  // ─────────────────────────────────────────────────────────────

  getSnapshot(sessionId: string): Promise<MachineSnapshot>;

  // ─────────────────────────────────────────────────────────────
  // Breakpoints
  // ─────────────────────────────────────────────────────────────

  addBreakpoint(sessionId: string, bp: BreakpointSpec): Promise<string>;

  removeBreakpoint(sessionId: string, breakpointId: string): Promise<void>;

  listBreakpoints(sessionId: string): Promise<Breakpoint[]>;

  toggleBreakpoint(sessionId: string, breakpointId: string, enabled: boolean): Promise<void>;
}

// ============================================================
// WEBSOCKET EVENTS - For real-time updates
// ============================================================

/**
 * Events the server sends to clients
 */
export type ServerEvent =
  | { type: 'snapshot'; snapshot: MachineSnapshot }
  | { type: 'breakpointHit'; breakpointId: string; snapshot: MachineSnapshot }
  | { type: 'awaitingInput'; snapshot: MachineSnapshot }
  | { type: 'done'; output: string; snapshot: MachineSnapshot }
  | { type: 'error'; error: { message: string }; snapshot?: MachineSnapshot };

/**
 * Commands the client sends to server
 */
export type ClientCommand =
  | { type: 'load'; code: string; input?: string }
  | { type: 'step' }
  | { type: 'stepN'; n: number }
  | { type: 'continue' }
  | { type: 'input'; text?: string; end?: boolean }
  | { type: 'addBreakpoint'; breakpoint: BreakpointSpec }
  | { type: 'removeBreakpoint'; breakpointId: string };
