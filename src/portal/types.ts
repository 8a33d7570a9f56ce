/**
 * src/portal/types.ts
 *
 * What the core needs from the remote portal. PortalClient is the HTTP
 * implementation; tests provide in-process fakes of these interfaces.
 */

import type { District, Hobli, Taluka, Village } from '../locations/types.js';
import type { SessionArtifact } from '../session/sessionManager.js';

// ─── Hierarchy API ────────────────────────────────────────────────────────────

export type RemoteDistrict = District;
export type RemoteTaluka = Omit<Taluka, 'districtCode'>;
export type RemoteHobli = Omit<Hobli, 'talukaCode'>;
export type RemoteVillage = Omit<Village, 'hobliCode'>;

/** Each call is one request returning the child rows of one node. */
export interface HierarchyApi {
    fetchDistricts(): Promise<RemoteDistrict[]>;
    fetchTalukas(districtCode: number): Promise<RemoteTaluka[]>;
    fetchHoblis(talukaCode: number): Promise<RemoteHobli[]>;
    fetchVillages(hobliCode: number): Promise<RemoteVillage[]>;
}

// ─── CAPTCHA ──────────────────────────────────────────────────────────────────

export interface CaptchaChallenge {
    challengeId: string;
    image: Buffer;
}

export interface CaptchaSolution {
    challengeId: string;
    text: string;
    /** Cost charged by the solving backend, 0 for manual solves. */
    cost: number;
}

// ─── Search API ───────────────────────────────────────────────────────────────

export type FieldValue = string | number | boolean | null;

/** Ordered key → value pairs exactly as the portal returned them. */
export type FieldMap = ReadonlyArray<readonly [string, FieldValue]>;

export interface SearchRequest {
    villageCode: number;
    partyName: string;
    middleName?: string;
    lastName?: string;
    fromDate: string;
    toDate: string;
    captchaId: string;
    captchaText: string;
}

export type SearchResponse =
    | { kind: 'ok'; rows: FieldMap[] }
    | { kind: 'unauthorized'; message: string }
    | { kind: 'invalid-captcha'; message: string }
    | { kind: 'error'; message: string; status: number | null };

export type ProbeResult =
    | { kind: 'ok'; message: string }
    | { kind: 'unauthorized'; message: string }
    | { kind: 'error'; message: string };

export interface SearchApi {
    generateCaptcha(): Promise<CaptchaChallenge>;
    search(request: SearchRequest, session: SessionArtifact): Promise<SearchResponse>;
}

/** Lightweight authenticated call used to check a session is still accepted. */
export interface SessionProbe {
    probe(session: SessionArtifact): Promise<ProbeResult>;
}
