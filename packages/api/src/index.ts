import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import type {
  AnalyzeResponse,
  CatalogResponse,
  RawNotebookRow,
  UserPersonaResponse,
  UserSearchResponse
} from '@persona/contracts';

type ApiOptions = {
  baseURL?: string;
  axiosConfig?: AxiosRequestConfig;
};

const DEFAULT_BASE =
  process.env.PERSONA_API_BASE_URL ??
  process.env.NEXT_PUBLIC_PERSONA_API_BASE_URL ??
  'http://localhost:4320';

export function createApi(options: ApiOptions = {}): AxiosInstance {
  const { baseURL = DEFAULT_BASE, axiosConfig = {} } = options;
  return axios.create({
    baseURL,
    ...axiosConfig,
  });
}

export type AnalyzeRequest = {
  records: RawNotebookRow[];
  precomputed?: Array<{ userId: string | number; persona: string; confidence?: number | null }>;
};

/**
 * Typed client for the persona bridge. Resolves to null for users the bridge
 * does not know about; every other non-2xx response rejects.
 */
export class PersonaClient {
  private readonly http: AxiosInstance;

  constructor(options: ApiOptions | AxiosInstance = {}) {
    this.http = 'interceptors' in options ? options : createApi(options);
  }

  async analyze(request: AnalyzeRequest): Promise<AnalyzeResponse> {
    const { data } = await this.http.post<AnalyzeResponse>('/personas/analyze', request);
    return data;
  }

  async getUser(userId: string): Promise<UserPersonaResponse | null> {
    const response = await this.http.get<UserPersonaResponse>(`/personas/${encodeURIComponent(userId)}`, {
      validateStatus: (status) => (status >= 200 && status < 300) || status === 404,
    });
    return response.status === 404 ? null : response.data;
  }

  async searchUsers(search: string, limit?: number): Promise<string[]> {
    const { data } = await this.http.get<UserSearchResponse>('/users', { params: { search, limit } });
    return data.userIds;
  }

  async catalog(): Promise<CatalogResponse> {
    const { data } = await this.http.get<CatalogResponse>('/catalog');
    return data;
  }
}

export type { AxiosInstance, AxiosRequestConfig } from 'axios';
