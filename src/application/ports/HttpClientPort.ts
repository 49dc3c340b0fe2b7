export interface HttpGetRequest {
  url: string;
  headers: Record<string, string>;
  params?: Record<string, string | number | boolean>;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  text: string;
}

export interface HttpClientPort {
  get(request: HttpGetRequest): Promise<HttpResponse>;
}
