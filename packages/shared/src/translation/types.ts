/**
 * Caixa delimitadora normalizada em [0,1] relativa à largura/altura da imagem.
 * `x`,`y` é o canto superior esquerdo.
 */
export type BoundingBox = {
  x: number;
  y: number;
  w: number;
  h: number;
};

export type ImageSize = {
  width: number;
  height: number;
};

export type TextSegment = {
  readonly id: string;
  readonly text: string;
  readonly bbox: Readonly<BoundingBox>;
  /** 0..1 */
  readonly confidence: number;
};

export type ScreenAnalysisResult = {
  segments: TextSegment[];
  imageSize: ImageSize;
};

export type TranslationResult = {
  sourceText: string;
  translatedText: string;
  sourceLanguage: string;
  targetLanguage: string;
};

export type BilingualSegment = {
  id: string;
  original: TextSegment;
  translated: string;
  sourceLanguage: string;
  targetLanguage: string;
};

export type RenderMode = 'below' | 'replace';

export type OverlayStyle = {
  mode: RenderMode;
  fontSize: number;
  fontFamily: string;
  textColor: string;
  backgroundColor: string;
  /** 0..1 */
  backgroundOpacity: number;
  padding: number;
};

export const DEFAULT_OVERLAY_STYLE: OverlayStyle = {
  mode: 'below',
  fontSize: 16,
  fontFamily: 'sans-serif',
  textColor: '#ffffff',
  backgroundColor: '#000000',
  backgroundOpacity: 0.75,
  padding: 4,
};

export type FlowStage =
  | 'idle'
  | 'analyzing'
  | 'translating'
  | 'rendering'
  | 'completed'
  | 'failed';

export type FlowErrorKind =
  | 'analysisFailure'
  | 'translationFailure'
  | 'renderingFailure'
  | 'cancelled'
  | 'noTextFound';

export const FLOW_PROGRESS: Record<FlowStage, number> = {
  idle: 0,
  analyzing: 0.25,
  translating: 0.5,
  rendering: 0.75,
  completed: 1,
  failed: 0,
};

/**
 * Imagem capturada: bytes codificados (PNG/JPEG) e dimensões em pixels.
 */
export type CapturedImage = {
  data: Buffer;
  width: number;
  height: number;
  /** Pixels por ponto da tela */
  scaleFactor: number;
  region?: { x: number; y: number; width: number; height: number };
};
