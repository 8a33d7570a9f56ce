/**
 * src/portal/portalClient.ts
 *
 * Typed client for the portal's JSON API:
 *
 *   POST /api/GetDistrictAsync   {}                     → district rows
 *   POST /api/GetTalukaAsync     { districtCode: "n" }  → taluka rows
 *   POST /api/GetHobliAsync      { talukaCode: "n" }    → hobli rows
 *   POST /api/GetVillageAsync    { hobliCode: "n" }     → village rows
 *   GET  /api/Generate                                  → PNG, challenge id in header "i"
 *   POST /api/NewECSearch        search payload         → { responseCode, responseMessage, data }
 *
 * Field casing is the portal's (districtNamee = English, districtNamek =
 * Kannada). Rows are validated with zod and mapped to the entity types;
 * extra fields are dropped here. Search rows keep every field, in order.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { cookieHeader, type SessionArtifact } from '../session/sessionManager.js';
import type { HttpResponse, HttpTransport } from './httpTransport.js';
import type {
    CaptchaChallenge,
    FieldMap,
    FieldValue,
    HierarchyApi,
    ProbeResult,
    RemoteDistrict,
    RemoteHobli,
    RemoteTaluka,
    RemoteVillage,
    SearchApi,
    SearchRequest,
    SearchResponse,
    SessionProbe,
} from './types.js';

// ─── Row schemas ──────────────────────────────────────────────────────────────

const name = z.string().nullish().transform((v) => v?.trim() ?? '');
const code = z.coerce.number().int();

const districtRow = z.object({ districtCode: code, districtNamee: name, districtNamek: name });
const talukaRow = z.object({ talukCode: code, talukNamee: name, talukNamek: name });
const hobliRow = z.object({ hoblicode: code, hoblinamee: name, hoblinamek: name });
const villageRow = z.object({
    villagecode: code,
    villagenamee: name,
    villagenamek: name,
    isurban: z.union([z.boolean(), z.number(), z.string()]).nullish(),
});

const searchEnvelope = z.object({
    responseCode: z.coerce.number().nullish(),
    responseMessage: z.string().nullish(),
    data: z.unknown(),
});

/** Placeholder district the portal lists ahead of the real ones. */
const DUMMY_DISTRICT_CODE = 0;

/** Success code of the search endpoint. */
export const SEARCH_OK = 1000;

const CAPTCHA_MESSAGE = /captcha/i;
const NO_RECORDS_MESSAGE = /no\s+(data|records?)\s+found|no\s+records?/i;

// ─── Client ───────────────────────────────────────────────────────────────────

export class PortalClient implements HierarchyApi, SearchApi, SessionProbe {
    constructor(private readonly transport: HttpTransport) {}

    // ─── Hierarchy ──────────────────────────────────────────────────────────

    async fetchDistricts(): Promise<RemoteDistrict[]> {
        const rows = await this.postList('/api/GetDistrictAsync', {}, districtRow);
        return rows
            .filter((r) => r.districtCode !== DUMMY_DISTRICT_CODE)
            .map((r) => ({ code: r.districtCode, name: r.districtNamee, localizedName: r.districtNamek }));
    }

    async fetchTalukas(districtCode: number): Promise<RemoteTaluka[]> {
        const rows = await this.postList('/api/GetTalukaAsync', { districtCode: String(districtCode) }, talukaRow);
        return rows.map((r) => ({ code: r.talukCode, name: r.talukNamee, localizedName: r.talukNamek }));
    }

    async fetchHoblis(talukaCode: number): Promise<RemoteHobli[]> {
        const rows = await this.postList('/api/GetHobliAsync', { talukaCode: String(talukaCode) }, hobliRow);
        return rows.map((r) => ({ code: r.hoblicode, name: r.hoblinamee, localizedName: r.hoblinamek }));
    }

    async fetchVillages(hobliCode: number): Promise<RemoteVillage[]> {
        const rows = await this.postList('/api/GetVillageAsync', { hobliCode: String(hobliCode) }, villageRow);
        return rows.map((r) => ({
            code: r.villagecode,
            name: r.villagenamee,
            localizedName: r.villagenamek,
            isUrban: toBoolean(r.isurban),
        }));
    }

    // ─── CAPTCHA ────────────────────────────────────────────────────────────

    async generateCaptcha(): Promise<CaptchaChallenge> {
        const resp = await this.transport.request({ method: 'GET', path: '/api/Generate' });
        if (!isSuccess(resp)) {
            throw new Error(`CAPTCHA generation failed: HTTP ${resp.status}`);
        }
        const challengeId = resp.headers['i'];
        if (!challengeId) {
            throw new Error('CAPTCHA response carried no challenge id');
        }
        return { challengeId, image: resp.body };
    }

    // ─── Search ─────────────────────────────────────────────────────────────

    async search(request: SearchRequest, session: SessionArtifact): Promise<SearchResponse> {
        const resp = await this.transport.request({
            method: 'POST',
            path: '/api/NewECSearch',
            headers: authHeaders(session),
            json: {
                _VillageCode: String(request.villageCode),
                _FromDate: request.fromDate,
                _ToDate: request.toDate,
                EcFilter: 'n',
                firstName: request.partyName,
                middleName: request.middleName ?? '',
                lastName: request.lastName ?? '',
                captchaID: request.captchaId,
                captchaCode: request.captchaText,
            },
        });
        return classifySearchResponse(resp);
    }

    // ─── Session probe ──────────────────────────────────────────────────────

    async probe(session: SessionArtifact): Promise<ProbeResult> {
        const resp = await this.transport.request({
            method: 'POST',
            path: '/api/GetDistrictAsync',
            headers: authHeaders(session),
            json: {},
        });
        if (isUnauthorized(resp)) return { kind: 'unauthorized', message: `HTTP ${resp.status}: session rejected` };
        if (!isSuccess(resp)) return { kind: 'error', message: `HTTP ${resp.status}` };

        const json = parseJson(resp);
        if (Array.isArray(json) && json.length > 0) {
            return { kind: 'ok', message: `Session valid (${json.length} districts visible)` };
        }
        return { kind: 'error', message: 'Unexpected probe response' };
    }

    // ─── Internals ──────────────────────────────────────────────────────────

    private async postList<S extends z.ZodTypeAny>(path: string, body: object, row: S): Promise<z.infer<S>[]> {
        const resp = await this.transport.request({ method: 'POST', path, json: body });
        if (!isSuccess(resp)) {
            throw new Error(`${path}: HTTP ${resp.status}`);
        }
        const parsed = z.array(row).safeParse(parseJson(resp));
        if (!parsed.success) {
            throw new Error(`${path}: unexpected response shape (${parsed.error.issues[0]?.message ?? 'unknown'})`);
        }
        return parsed.data;
    }
}

// ─── Response helpers ─────────────────────────────────────────────────────────

function isSuccess(resp: HttpResponse): boolean {
    return resp.status >= 200 && resp.status < 300;
}

function isUnauthorized(resp: HttpResponse): boolean {
    return resp.status === 401 || resp.status === 403;
}

function parseJson(resp: HttpResponse): unknown {
    const text = resp.body.toString('utf-8');
    try {
        return JSON.parse(text);
    } catch {
        throw new Error(`Expected JSON, got: ${text.slice(0, 120)}`);
    }
}

function authHeaders(session: SessionArtifact): Record<string, string> {
    const headers: Record<string, string> = {};
    if (session.authToken) headers['_append'] = session.authToken;
    const cookies = cookieHeader(session);
    if (cookies) headers['Cookie'] = cookies;
    return headers;
}

function toBoolean(v: boolean | number | string | null | undefined): boolean {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v !== 0;
    if (typeof v === 'string') return ['true', '1', 'y', 'yes'].includes(v.trim().toLowerCase());
    return false;
}

function toFieldValue(v: unknown): FieldValue {
    if (v === null || v === undefined) return null;
    if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
    return JSON.stringify(v);
}

/** `data` arrives either as an array or as a JSON-encoded string of one. */
export function toFieldMaps(data: unknown): FieldMap[] {
    let rows: unknown = data;
    if (typeof rows === 'string') {
        const trimmed = rows.trim();
        if (!trimmed) return [];
        rows = JSON.parse(trimmed);
    }
    if (rows === null || rows === undefined) return [];
    if (!Array.isArray(rows)) {
        throw new Error('search data is not a list');
    }
    return rows
        .filter((r): r is Record<string, unknown> => typeof r === 'object' && r !== null && !Array.isArray(r))
        .map((r) => Object.entries(r).map(([k, v]) => [k, toFieldValue(v)] as const));
}

export function classifySearchResponse(resp: HttpResponse): SearchResponse {
    if (isUnauthorized(resp)) {
        return { kind: 'unauthorized', message: `HTTP ${resp.status}` };
    }
    if (!isSuccess(resp)) {
        return { kind: 'error', message: `HTTP ${resp.status}`, status: resp.status };
    }

    let envelope: z.infer<typeof searchEnvelope>;
    try {
        envelope = searchEnvelope.parse(parseJson(resp));
    } catch (err) {
        return { kind: 'error', message: `Unreadable search response: ${errorMessage(err)}`, status: resp.status };
    }

    const message = envelope.responseMessage ?? '';
    if (envelope.responseCode === SEARCH_OK) {
        try {
            return { kind: 'ok', rows: toFieldMaps(envelope.data) };
        } catch (err) {
            return { kind: 'error', message: `Unreadable search rows: ${errorMessage(err)}`, status: resp.status };
        }
    }
    if (CAPTCHA_MESSAGE.test(message)) {
        return { kind: 'invalid-captcha', message };
    }
    if (NO_RECORDS_MESSAGE.test(message)) {
        log.debug(`[Portal] "${message}" read as an empty result`);
        return { kind: 'ok', rows: [] };
    }
    return {
        kind: 'error',
        message: message || `responseCode ${envelope.responseCode ?? 'missing'}`,
        status: resp.status,
    };
}
