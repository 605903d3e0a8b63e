// Provisioning-specific types
export interface ServerlessEndpoint {
  id: string;
  name: string;
  templateId?: string;
  gpuIds?: string;
  workersMin?: number;
  workersMax?: number;
  idleTimeout?: number;
}

export interface TemplateInput {
  name: string;
  imageName: string;
  dockerArgs?: string;
  containerDiskInGb: number;
  volumeInGb: number;
  env: Record<string, string>;
}

export interface EndpointInput {
  name: string;
  templateId: string;
  gpuIds: string;
  workersMin: number;
  workersMax: number;
  idleTimeout: number;
  executionTimeout: number;
  gpuUtilization: number;
}

export interface EndpointUpdate {
  id: string;
  name?: string;
  templateId?: string;
  workersMin?: number;
  workersMax?: number;
  idleTimeout?: number;
}

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

export interface OcrRequest {
  /** Base64-encoded image or PDF, or an http(s) URL */
  image: string;
  maxOutputTokens: number;
  includeImages: boolean;
  includeHeadersFooters: boolean;
}

export interface OcrPageSummary {
  pageNumber: number;
  tokenCount?: number;
  imageCount: number;
  chunkCount: number;
  markdown: string;
  html: string;
}

export interface EndpointTestReport {
  endpointId: string;
  jobId: string;
  pages: OcrPageSummary[];
  totalTokens?: number;
}
