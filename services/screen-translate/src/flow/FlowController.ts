import { EventEmitter } from 'events';
import {
  BilingualSegment,
  CapturedImage,
  FLOW_PROGRESS,
  OverlayStyle,
  ScreenAnalysisResult,
  TextSegment,
  TranslationEngineType,
} from '@screenlingo/shared';
import { getLogger } from '@screenlingo/logger';
import { FlowError, errorMessage, isAbortError } from '../errors';
import type { HistoryRecord } from '../storage/HistoryStore';
import type { EngineTranslation, TranslateRequest } from '../translate/TranslationOrchestrator';

const logger = getLogger();

export type FlowPhase =
  | { stage: 'idle' }
  | { stage: 'analyzing' }
  | { stage: 'translating' }
  | { stage: 'rendering' }
  | { stage: 'completed' }
  | { stage: 'failed'; error: FlowError };

export interface FlowResult {
  image: Buffer;
  segments: BilingualSegment[];
  analysis: ScreenAnalysisResult;
  engine: TranslationEngineType;
  startedAt: number;
  elapsedMs: number;
}

export type FlowOutcome = { ok: true; result: FlowResult } | { ok: false; error: FlowError };

export interface FlowSettings {
  sourceLanguage: string | null;
  targetLanguage: string;
  preferredEngine: TranslationEngineType;
  fallbackEngine: TranslationEngineType | null;
  overlay: OverlayStyle;
}

export interface FlowControllerDeps {
  extractor: { analyze(image: CapturedImage, signal?: AbortSignal): Promise<ScreenAnalysisResult> };
  orchestrator: {
    translateWithEngine(segments: TextSegment[], request: TranslateRequest): Promise<EngineTranslation>;
  };
  renderer: {
    render(image: CapturedImage, segments: BilingualSegment[], style: OverlayStyle): Promise<Buffer | null>;
  };
  settings: () => FlowSettings;
  history?: { record(entry: HistoryRecord): number };
}

type FlowRun = {
  id: number;
  controller: AbortController;
  startedAt: number;
};

/**
 * Máquina de fases do fluxo: idle -> analyzing -> translating -> rendering -> completed.
 * Um fluxo por vez: start() cancela o anterior, que nunca mais escreve estado.
 *
 * Eventos: 'phase' ({ phase, progress }), 'result' (FlowResult), 'error' (FlowError)
 */
export class FlowController extends EventEmitter {
  private phase: FlowPhase = { stage: 'idle' };
  private current: FlowRun | null = null;
  private runCounter = 0;
  private lastResult: FlowResult | null = null;
  private lastError: FlowError | null = null;
  private readonly deps: FlowControllerDeps;

  constructor(deps: FlowControllerDeps) {
    super();
    this.deps = deps;
  }

  getPhase(): FlowPhase {
    return this.phase;
  }

  getProgress(): number {
    return FLOW_PROGRESS[this.phase.stage];
  }

  getLastResult(): FlowResult | null {
    return this.lastResult;
  }

  getLastError(): FlowError | null {
    return this.lastError;
  }

  isProcessing(): boolean {
    return this.current !== null;
  }

  async start(image: CapturedImage, overrides: Partial<FlowSettings> = {}): Promise<FlowOutcome> {
    // Config inválida lança aqui, antes de qualquer estado mudar
    const settings = { ...this.deps.settings(), ...overrides };

    if (this.current) {
      logger.info({ run: this.current.id }, 'Replacing running translation flow');
      this.cancel();
    }

    const run: FlowRun = { id: ++this.runCounter, controller: new AbortController(), startedAt: Date.now() };
    this.current = run;
    this.lastResult = null;
    this.lastError = null;

    return this.execute(run, image, settings);
  }

  /**
   * Cancela o fluxo em andamento; retorna false se não havia nenhum
   */
  cancel(): boolean {
    const run = this.current;
    if (!run) {
      return false;
    }
    this.current = null;
    run.controller.abort();
    const error = new FlowError('cancelled');
    this.lastError = error;
    this.setPhase({ stage: 'failed', error });
    logger.info({ run: run.id }, 'Translation flow cancelled');
    return true;
  }

  reset(): void {
    if (this.current) {
      this.current.controller.abort();
      this.current = null;
    }
    this.lastResult = null;
    this.lastError = null;
    this.setPhase({ stage: 'idle' });
  }

  private async execute(run: FlowRun, image: CapturedImage, settings: FlowSettings): Promise<FlowOutcome> {
    const signal = run.controller.signal;
    let result: FlowResult;

    try {
      this.enter(run, { stage: 'analyzing' });
      const analysis = await this.phaseStep(run, 'analysisFailure', () => this.deps.extractor.analyze(image, signal));

      if (analysis.segments.length === 0) {
        throw new FlowError('noTextFound');
      }

      this.enter(run, { stage: 'translating' });
      const translation = await this.phaseStep(run, 'translationFailure', () =>
        this.deps.orchestrator.translateWithEngine(analysis.segments, {
          to: settings.targetLanguage,
          from: settings.sourceLanguage,
          preferredEngine: settings.preferredEngine,
          fallbackEngine: settings.fallbackEngine,
          signal,
        })
      );

      this.enter(run, { stage: 'rendering' });
      const rendered = await this.phaseStep(run, 'renderingFailure', () =>
        this.deps.renderer.render(image, translation.segments, settings.overlay)
      );
      if (!rendered) {
        throw new FlowError('renderingFailure', 'The renderer produced no image.');
      }

      result = {
        image: rendered,
        segments: translation.segments,
        analysis,
        engine: translation.engine,
        startedAt: run.startedAt,
        elapsedMs: Date.now() - run.startedAt,
      };
    } catch (error) {
      const flowError = error instanceof FlowError ? error : new FlowError('analysisFailure', errorMessage(error), { cause: error });
      return this.fail(run, flowError);
    }

    this.current = null;
    this.lastResult = result;
    this.setPhase({ stage: 'completed' });
    logger.info(
      { run: run.id, engine: result.engine, segments: result.segments.length, elapsedMs: result.elapsedMs },
      'Translation flow completed'
    );

    this.recordHistory(result);
    try {
      this.emit('result', result);
    } catch (error) {
      logger.warn({ err: error, run: run.id }, 'Result listener failed');
    }
    return { ok: true, result };
  }

  /**
   * Executa uma fase, embrulhando falhas no tipo de erro da fase
   */
  private async phaseStep<T>(run: FlowRun, kind: FlowError['kind'], fn: () => Promise<T>): Promise<T> {
    let value: T;
    try {
      value = await fn();
    } catch (error) {
      if (isAbortError(error) || run.controller.signal.aborted) {
        throw new FlowError('cancelled');
      }
      throw new FlowError(kind, errorMessage(error), { cause: error });
    }
    this.checkpoint(run);
    return value;
  }

  private checkpoint(run: FlowRun): void {
    if (run.controller.signal.aborted || this.current !== run) {
      throw new FlowError('cancelled');
    }
  }

  private enter(run: FlowRun, phase: FlowPhase): void {
    this.checkpoint(run);
    this.setPhase(phase);
  }

  private fail(run: FlowRun, error: FlowError): FlowOutcome {
    // Execução substituída ou cancelada: cancel() já registrou o estado
    if (this.current !== run) {
      return { ok: false, error: error.kind === 'cancelled' ? error : new FlowError('cancelled') };
    }

    this.current = null;
    run.controller.abort();
    this.lastError = error;
    this.setPhase({ stage: 'failed', error });

    if (error.kind === 'cancelled') {
      logger.info({ run: run.id }, 'Translation flow cancelled');
    } else {
      logger.error({ err: error, run: run.id, kind: error.kind }, 'Translation flow failed');
      if (this.listenerCount('error') > 0) {
        this.emit('error', error);
      }
    }
    return { ok: false, error };
  }

  private setPhase(phase: FlowPhase): void {
    this.phase = phase;
    this.emit('phase', { phase, progress: FLOW_PROGRESS[phase.stage] });
  }

  private recordHistory(result: FlowResult): void {
    if (!this.deps.history) return;
    try {
      this.deps.history.record({ engine: result.engine, segments: result.segments });
    } catch (error) {
      logger.warn({ err: error }, 'Could not record translation history');
    }
  }
}
