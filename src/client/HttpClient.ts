/**
 * HTTP Client
 * Axios wrapper that attaches the bearer token and the portal headers
 */

import axios, {
    AxiosError,
    type AxiosAdapter,
    type AxiosInstance,
    type AxiosRequestConfig,
    type AxiosResponse,
} from 'axios';
import { DEFAULT_USER_AGENT } from '../auth/PasswordGrantFlow.js';
import { ApiError, errorMessage } from '../utils/errors.js';

const DEFAULT_BASE_URL = 'https://api-eu.sigencloud.com';
const DEFAULT_TIMEOUT_MS = 20000;

export interface HttpClientConfig {
    baseUrl?: string;
    /** Supplies the bearer token for each request */
    getAccessToken?: () => string | Promise<string>;
    timeout?: number;
    userAgent?: string;
    headers?: Record<string, string>;
    /** Replaces axios' network adapter (tests) */
    adapter?: AxiosAdapter;
}

export class HttpClient {
    private readonly client: AxiosInstance;

    constructor(config: HttpClientConfig = {}) {
        this.client = axios.create({
            baseURL: config.baseUrl || DEFAULT_BASE_URL,
            timeout: config.timeout || DEFAULT_TIMEOUT_MS,
            headers: {
                'Content-Type': 'application/json; charset=utf-8',
                'User-Agent': config.userAgent || DEFAULT_USER_AGENT,
                ...config.headers,
            },
            ...(config.adapter ? { adapter: config.adapter } : {}),
        });

        const getAccessToken = config.getAccessToken;
        if (getAccessToken) {
            // Add auth interceptor
            this.client.interceptors.request.use(async (requestConfig) => {
                const accessToken = await getAccessToken();
                requestConfig.headers.Authorization = `Bearer ${accessToken}`;
                return requestConfig;
            });
        }
    }

    /**
     * GET a JSON document. HTTP and transport failures become ApiError.
     */
    async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<T> {
        try {
            const response: AxiosResponse<T> = await this.client.get(url, config);
            return response.data;
        } catch (error) {
            const status = error instanceof AxiosError ? error.response?.status : undefined;
            throw new ApiError(`GET ${url} failed: ${errorMessage(error)}`, { status, cause: error });
        }
    }
}
