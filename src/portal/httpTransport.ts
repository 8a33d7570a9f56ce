/**
 * src/portal/httpTransport.ts
 *
 * Raw HTTP to the portal. Direct requests use fetch; when a proxy is
 * configured they go through got-scraping, which handles proxy auth and
 * browser-like header ordering.
 *
 * The transport never throws on an HTTP status: callers classify 401s and
 * friends themselves. It throws only when no response arrived at all.
 */

import { log } from 'crawlee';

export interface HttpRequest {
    method: 'GET' | 'POST';
    /** Path below the portal origin, e.g. "/api/GetDistrictAsync". */
    path: string;
    json?: unknown;
    headers?: Record<string, string>;
}

export interface HttpResponse {
    status: number;
    /** Lower-cased header names. */
    headers: Record<string, string>;
    body: Buffer;
}

export interface HttpTransport {
    request(req: HttpRequest): Promise<HttpResponse>;
}

export interface PortalTransportOptions {
    baseUrl: string;
    proxyUrl?: string;
    timeoutMs?: number;
}

const BROWSER_UA =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';

export class PortalTransport implements HttpTransport {
    private readonly baseUrl: string;
    private readonly proxyUrl?: string;
    private readonly timeoutMs: number;

    constructor(options: PortalTransportOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.proxyUrl = options.proxyUrl ? normaliseProxyUrl(options.proxyUrl) : undefined;
        this.timeoutMs = options.timeoutMs ?? 30_000;
    }

    async request(req: HttpRequest): Promise<HttpResponse> {
        const url = `${this.baseUrl}${req.path}`;
        const headers: Record<string, string> = {
            'Accept': 'application/json',
            'Content-Type': 'application/json',
            'Origin': this.baseUrl,
            'Referer': `${this.baseUrl}/`,
            'User-Agent': BROWSER_UA,
            ...req.headers,
        };
        const body = req.json === undefined ? undefined : JSON.stringify(req.json);

        log.debug(`[HTTP] ${req.method} ${req.path}${this.proxyUrl ? ' (proxy)' : ''}`);
        return this.proxyUrl
            ? this.viaProxy(url, req.method, headers, body, this.proxyUrl)
            : this.direct(url, req.method, headers, body);
    }

    private async direct(
        url: string,
        method: HttpRequest['method'],
        headers: Record<string, string>,
        body: string | undefined
    ): Promise<HttpResponse> {
        const resp = await fetch(url, { method, headers, body, signal: AbortSignal.timeout(this.timeoutMs) });
        const flat: Record<string, string> = {};
        resp.headers.forEach((value, key) => {
            flat[key.toLowerCase()] = value;
        });
        return { status: resp.status, headers: flat, body: Buffer.from(await resp.arrayBuffer()) };
    }

    private async viaProxy(
        url: string,
        method: HttpRequest['method'],
        headers: Record<string, string>,
        body: string | undefined,
        proxyUrl: string
    ): Promise<HttpResponse> {
        const { gotScraping } = await import('got-scraping');
        const response = await gotScraping({
            url,
            method,
            headers,
            body,
            proxyUrl,
            timeout: { request: this.timeoutMs },
            retry: { limit: 0 },
            throwHttpErrors: false,
            followRedirect: true,
        });

        const flat: Record<string, string> = {};
        for (const [key, value] of Object.entries(response.headers)) {
            if (value === undefined) continue;
            flat[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
        }
        return { status: response.statusCode, headers: flat, body: response.rawBody };
    }
}

/** Proxy URLs with percent-encoded credentials are decoded once for got. */
function normaliseProxyUrl(proxyUrl: string): string {
    if (!proxyUrl.includes('@')) return proxyUrl;
    try {
        const p = new URL(proxyUrl);
        const user = decodeURIComponent(p.username);
        const pass = decodeURIComponent(p.password);
        return `${p.protocol}//${user}:${pass}@${p.hostname}${p.port ? `:${p.port}` : ''}`;
    } catch {
        log.warning('[HTTP] PORTAL_PROXY_URL is not a valid URL; using it as given');
        return proxyUrl;
    }
}
