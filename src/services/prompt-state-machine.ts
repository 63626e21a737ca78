import logger from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { cleanOutput, escapeRegExp } from '../utils/output.js';
import type { CommandStep, ExecutionResult, Session, ShellChannel } from '../types/device.js';

export type MachineState = 'Idle' | 'Sent' | 'AwaitValidation' | 'AwaitPrompt' | 'Complete' | 'Timeout';

export interface ReadyOptions {
  promptMarker: string;
  timeoutMs: number;
  quietPeriodMs: number;
}

interface Exchange {
  /** undefined: nothing is written, only the prompt is awaited */
  command?: string;
  lineTerminator: string;
  validation?: readonly string[];
  delayBeforePromptMs: number;
  timeoutMs: number;
  promptMarker: string;
  awaitPrompt: boolean;
  quietPeriodMs: number;
}

/**
 * Position just past the earliest occurrence of any validation string,
 * or -1 while none has been seen.
 */
export function findValidation(text: string, validation: readonly string[]): number {
  let end = -1;
  let earliest = Infinity;
  for (const candidate of validation) {
    const index = text.indexOf(candidate);
    if (index !== -1 && index < earliest) {
      earliest = index;
      end = index + candidate.length;
    }
  }
  return end;
}

/**
 * Drives one command step against an interactive shell.
 *
 * Idle -> Sent -> AwaitValidation -> AwaitPrompt -> Complete | Timeout
 *
 * A prompt marker only completes the step when it ends the normalized
 * buffer, sits after the validation match, and no bytes have arrived for the
 * quiet period. The timeout counts from the last received byte. Nothing is
 * ever resent; retry policy belongs to the caller.
 */
export class PromptStateMachine {
  execute(session: Session, step: CommandStep, signal?: AbortSignal): Promise<ExecutionResult> {
    if (!session.open) {
      const now = Date.now();
      return Promise.resolve({
        status: 'Error',
        error: 'Session is closed',
        raw: '',
        output: '',
        startedAt: now,
        finishedAt: now,
        elapsedMs: 0,
      });
    }

    return this.drive(session.channel, {
      command: step.command,
      lineTerminator: step.lineTerminator,
      validation: step.validation && step.validation.length > 0 ? step.validation : undefined,
      delayBeforePromptMs: step.delayBeforePromptMs,
      timeoutMs: step.timeoutMs,
      promptMarker: step.promptMarker,
      awaitPrompt: step.awaitPrompt,
      quietPeriodMs: step.quietPeriodMs,
    }, signal, () => {
      session.lastActivityAt = Date.now();
    });
  }

  /** Waits for the idle prompt a freshly opened shell prints, without sending anything. */
  awaitReady(channel: ShellChannel, options: ReadyOptions, signal?: AbortSignal): Promise<ExecutionResult> {
    return this.drive(channel, {
      lineTerminator: '',
      delayBeforePromptMs: 0,
      awaitPrompt: true,
      ...options,
    }, signal);
  }

  private drive(
    channel: ShellChannel,
    exchange: Exchange,
    signal?: AbortSignal,
    onActivity?: () => void
  ): Promise<ExecutionResult> {
    return new Promise((resolve) => {
      const startedAt = Date.now();
      const promptPattern = new RegExp(`${escapeRegExp(exchange.promptMarker)}\\s*$`);
      let state: MachineState = 'Idle';
      let raw = '';
      let text = '';
      let lastDataAt = startedAt;
      let validationEnd = 0;
      let settled = false;
      let inactivityTimer: NodeJS.Timeout | null = null;
      let checkTimer: NodeJS.Timeout | null = null;

      const transition = (next: MachineState): void => {
        logger.debug('Prompt state transition', { command: exchange.command, from: state, to: next });
        state = next;
      };

      const cleanup = (): void => {
        if (inactivityTimer) clearTimeout(inactivityTimer);
        if (checkTimer) clearTimeout(checkTimer);
        inactivityTimer = null;
        checkTimer = null;
        channel.removeListener('data', onData);
        channel.removeListener('close', onClose);
        signal?.removeEventListener('abort', onAbort);
      };

      const finish = (outcome: { status: 'Complete' | 'Timeout' } | { status: 'Error'; error: string }): void => {
        if (settled) {
          return;
        }
        settled = true;
        cleanup();
        if (outcome.status !== 'Error') {
          transition(outcome.status);
        }
        const finishedAt = Date.now();
        resolve({
          ...outcome,
          raw,
          output: text,
          startedAt,
          finishedAt,
          elapsedMs: finishedAt - startedAt,
        });
      };

      const armInactivity = (): void => {
        if (inactivityTimer) clearTimeout(inactivityTimer);
        inactivityTimer = setTimeout(() => {
          logger.debug('Step timed out waiting for output', {
            command: exchange.command,
            state,
            timeoutMs: exchange.timeoutMs,
          });
          finish({ status: 'Timeout' });
        }, exchange.timeoutMs);
      };

      const scheduleCheck = (delayMs: number): void => {
        if (checkTimer) clearTimeout(checkTimer);
        checkTimer = setTimeout(() => {
          checkTimer = null;
          evaluate();
        }, delayMs);
      };

      const evaluate = (): void => {
        if (state === 'AwaitValidation') {
          const end = findValidation(text, exchange.validation ?? []);
          if (end === -1) {
            return;
          }
          validationEnd = end;
          transition('AwaitPrompt');
        }
        if (state !== 'AwaitPrompt') {
          return;
        }

        const readyAt = Math.max(lastDataAt + exchange.quietPeriodMs, startedAt + exchange.delayBeforePromptMs);
        const now = Date.now();
        if (now < readyAt) {
          scheduleCheck(readyAt - now);
          return;
        }

        if (!exchange.awaitPrompt) {
          finish({ status: 'Complete' });
          return;
        }

        const match = promptPattern.exec(text);
        if (match && match.index >= validationEnd) {
          finish({ status: 'Complete' });
        }
      };

      function onData(chunk: string): void {
        raw += chunk;
        text = cleanOutput(raw);
        lastDataAt = Date.now();
        onActivity?.();
        armInactivity();
        evaluate();
      }

      function onClose(): void {
        finish({ status: 'Error', error: 'Channel closed by remote' });
      }

      function onAbort(): void {
        finish({ status: 'Error', error: 'Aborted' });
      }

      if (signal?.aborted) {
        onAbort();
        return;
      }

      channel.on('data', onData);
      channel.on('close', onClose);
      signal?.addEventListener('abort', onAbort, { once: true });

      if (exchange.command !== undefined) {
        try {
          channel.write(exchange.command + exchange.lineTerminator);
        } catch (error) {
          finish({ status: 'Error', error: errorMessage(error) });
          return;
        }
        transition('Sent');
      }

      transition(exchange.validation ? 'AwaitValidation' : 'AwaitPrompt');
      armInactivity();
      evaluate();
    });
  }
}
