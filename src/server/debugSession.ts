/**
 * Debug Session - Wrapper around an interpreter session for remote debugging
 *
 * Manages a single debug session with:
 * - Program loading and loop resolution
 * - Step execution with breakpoint checking
 * - Incremental input for `,`
 */

import type {
  SessionConfig,
  SessionStatus,
  MachineSnapshot,
  StepResult,
  Breakpoint,
  BreakpointSpec,
  LoadResult,
} from './debugService';
import { Session } from '../core/session/session';
import { stepOnce } from '../core/engine/machineStep';
import { DEFAULT_SESSION_PARAMS, isHalted, type SessionParams } from '../core/engine/machine';
import { isFail } from '../outcome/outcome';
import { allDiagnostics } from '../outcome/failure';
import { formatDiagnostic } from '../outcome/diagnostic';
import { QueuedInput } from '../ports/source';
import { MemoryOutput } from '../ports/sink';
import { MemoryDiagnostics } from '../ports/diagnostics';

const DEFAULT_CONTINUE_LIMIT = 1_000_000;

// ============================================================
// DEBUG SESSION
// ============================================================

let sessionCounter = 0;

export class DebugSession {
  readonly id: string;
  readonly config: SessionConfig;

  private session: Session | null = null;
  private input = new QueuedInput();
  private output = new MemoryOutput();
  private diagnostics = new MemoryDiagnostics();

  private _stepCount = 0;
  private _status: SessionStatus = 'idle';
  private _error: string | null = null;

  // Breakpoints
  private breakpoints: Breakpoint[] = [];
  private nextBreakpointId = 1;
  /** A breakpoint was reported at the current ip; resuming steps past it. */
  private stoppedAtBreakpoint = false;

  constructor(config: SessionConfig = {}) {
    this.id = `session_${++sessionCounter}_${Date.now().toString(36)}`;
    this.config = config;
  }

  get stepCount(): number {
    return this._stepCount;
  }

  get status(): SessionStatus {
    return this._status;
  }

  private params(): SessionParams {
    const c = this.config;
    return {
      ...DEFAULT_SESSION_PARAMS,
      tapeSize: c.tapeSize ?? DEFAULT_SESSION_PARAMS.tapeSize,
      eofBehavior: c.eofBehavior ?? DEFAULT_SESSION_PARAMS.eofBehavior,
      flags: {
        ...DEFAULT_SESSION_PARAMS.flags,
        debug: c.debug ?? false,
        specialOps: c.specialOps ?? DEFAULT_SESSION_PARAMS.flags.specialOps,
      },
    };
  }

  // ─────────────────────────────────────────────────────────────
  // CODE LOADING
  // ─────────────────────────────────────────────────────────────

  /**
   * Start over with a new program. Pre-supplied `input` is followed by end
   * of input; without it, `,` waits for provideInput().
   */
  loadCode(code: string, input?: string): LoadResult {
    this.input = new QueuedInput();
    this.output = new MemoryOutput();
    this.diagnostics = new MemoryDiagnostics();
    this._stepCount = 0;
    this._error = null;
    this.session = null;
    this.stoppedAtBreakpoint = false;

    if (input !== undefined) {
      this.input.push(input);
      this.input.end();
    }

    let session: Session;
    try {
      session = new Session(this.params(), {
        input: this.input,
        output: this.output,
        diagnostics: this.diagnostics,
      });
    } catch (e) {
      return this.loadFailed(e instanceof Error ? e.message : String(e));
    }

    const loaded = session.load(Buffer.from(code, 'utf8'));
    if (isFail(loaded)) {
      return this.loadFailed(allDiagnostics(loaded.failure).map(formatDiagnostic).join('\n'));
    }

    this.session = session;
    this._status = isHalted(session.machine) ? 'done' : 'paused';
    return { success: true };
  }

  private loadFailed(message: string): LoadResult {
    this._status = 'error';
    this._error = message;
    return { success: false, error: message };
  }

  // ─────────────────────────────────────────────────────────────
  // STEPPING
  // ─────────────────────────────────────────────────────────────

  step(): StepResult {
    if (!this.session) {
      return { snapshot: this.getSnapshot(), outcome: 'error' };
    }

    if (this._status === 'done' || this._status === 'error') {
      return {
        snapshot: this.getSnapshot(),
        outcome: this._status === 'done' ? 'done' : 'error',
      };
    }

    const machine = this.session.machine;
    const outcome = stepOnce(machine);
    machine.ports.output.flush();

    switch (outcome.tag) {
      case 'AwaitingInput':
        this._status = 'awaiting-input';
        return { snapshot: this.getSnapshot(), outcome: 'awaiting-input' };

      case 'Halted':
        this._status = 'done';
        return { snapshot: this.getSnapshot(), outcome: 'done' };

      case 'Stepped':
      case 'Reset':
        this._stepCount++;
        this.stoppedAtBreakpoint = false;
        break;
    }

    if (isHalted(machine)) {
      this._status = 'done';
      return { snapshot: this.getSnapshot(), outcome: 'done' };
    }

    this._status = 'paused';
    return this.breakpointResult() ?? { snapshot: this.getSnapshot(), outcome: 'stepped' };
  }

  /**
   * Run up to `n` steps. A breakpoint on the byte about to execute stops the
   * run before it, unless the session is already stopped there.
   */
  stepN(n: number): StepResult {
    if (this._status === 'paused' && !this.stoppedAtBreakpoint) {
      const hit = this.breakpointResult();
      if (hit) return hit;
    }

    let result: StepResult = { snapshot: this.getSnapshot(), outcome: 'stepped' };

    for (let i = 0; i < n; i++) {
      result = this.step();
      if (result.outcome !== 'stepped') break;
    }

    return result;
  }

  continue(): StepResult {
    return this.stepN(this.config.maxSteps ?? DEFAULT_CONTINUE_LIMIT);
  }

  provideInput(text: string, end = false): MachineSnapshot {
    this.input.push(text);
    if (end) this.input.end();
    if (this._status === 'awaiting-input') this._status = 'paused';
    return this.getSnapshot();
  }

  // ─────────────────────────────────────────────────────────────
  // BREAKPOINTS
  // ─────────────────────────────────────────────────────────────

  addBreakpoint(bp: BreakpointSpec): string {
    if (bp.type === 'offset' && (typeof bp.offset !== 'number' || !Number.isInteger(bp.offset) || bp.offset < 0)) {
      throw new Error('Offset breakpoint needs a non-negative integer offset');
    }
    if (bp.type === 'operator' && (typeof bp.operator !== 'string' || bp.operator.length !== 1)) {
      throw new Error('Operator breakpoint needs a single-character operator');
    }

    const id = `bp_${this.nextBreakpointId++}`;
    this.breakpoints.push({
      id,
      type: bp.type,
      offset: bp.type === 'offset' ? bp.offset : undefined,
      operator: bp.type === 'operator' ? bp.operator : undefined,
      enabled: bp.enabled ?? true,
    });
    return id;
  }

  removeBreakpoint(breakpointId: string): void {
    this.breakpoints = this.breakpoints.filter(bp => bp.id !== breakpointId);
  }

  listBreakpoints(): Breakpoint[] {
    return this.breakpoints.map(bp => ({ ...bp }));
  }

  toggleBreakpoint(breakpointId: string, enabled: boolean): void {
    const bp = this.breakpoints.find(b => b.id === breakpointId);
    if (bp) bp.enabled = enabled;
  }

  private breakpointResult(): StepResult | undefined {
    const breakpointId = this.getHitBreakpoint();
    if (!breakpointId) return undefined;
    this.stoppedAtBreakpoint = true;
    return { snapshot: this.getSnapshot(), outcome: 'breakpoint', breakpointId };
  }

  /** The first enabled breakpoint matching the byte about to execute. */
  private getHitBreakpoint(): string | undefined {
    if (!this.session) return undefined;
    const { ip, program } = this.session.machine;
    const op = program.at(ip);

    for (const bp of this.breakpoints) {
      if (!bp.enabled) continue;

      switch (bp.type) {
        case 'offset':
          if (bp.offset === ip) return bp.id;
          break;

        case 'operator':
          if (op !== undefined && bp.operator === String.fromCharCode(op)) return bp.id;
          break;
      }
    }

    return undefined;
  }

  // ─────────────────────────────────────────────────────────────
  // STATE INSPECTION
  // ─────────────────────────────────────────────────────────────

  getSnapshot(): MachineSnapshot {
    const base = {
      step: this._stepCount,
      status: this._status,
      output: this.output.text(),
      warnings: this.diagnostics.lines(),
      dump: this.diagnostics.text,
      inputBuffered: this.input.buffered,
      inputEnded: this.input.isEnded,
      error: this._error ? { message: this._error } : undefined,
    };

    if (!this.session) {
      return { ...base, ip: 0, tp: 0, tpMax: 0, line: 1, column: 0, tape: [], programLength: 0 };
    }

    const m = this.session.machine;
    const op = m.program.at(m.ip);
    return {
      ...base,
      ip: m.ip,
      op: op === undefined ? undefined : String.fromCharCode(op),
      tp: m.tp,
      tpMax: m.tpMax,
      line: m.cursor.line,
      column: m.cursor.column,
      tape: Array.from(m.tape.subarray(0, m.tpMax + 1)),
      programLength: m.program.length,
    };
  }
}
