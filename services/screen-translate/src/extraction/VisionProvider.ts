import type { VisionProviderId, VisionRequest, VisionResponse } from '@screenlingo/shared';

/**
 * Interface base para providers de visão computacional
 */
export interface VisionProvider {
  id: VisionProviderId;
  /** apiKey é null para providers locais sem autenticação */
  analyzeImage(req: VisionRequest, apiKey: string | null): Promise<VisionResponse>;
}
