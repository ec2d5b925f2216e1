/**
 * Consent Page Renderer
 *
 * Compiles templates/consent.hbs on first use and keeps the compiled
 * template for the life of the container.
 * All values are automatically HTML-escaped by Handlebars.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import Handlebars from 'handlebars';
import type { RegisteredClient } from './types';

/** Path the consent form submits to */
export const CONFIRM_PATH = '/confirm_auth';

export interface ConsentPageData {
    readonly clientId: string;
    readonly clientName: string;
    readonly websiteUrl: string;
    readonly logoUrl: string;
    readonly scopes: readonly string[];
    readonly state: string;
    readonly csrfToken: string;
    readonly confirmPath: string;
}

export interface ConsentPageParams {
    readonly client: RegisteredClient;
    readonly scopes: readonly string[];
    readonly state: string;
    readonly csrfToken: string;
    readonly confirmPath?: string;
}

// =============================================================================
// Template Loading
// =============================================================================

const TEMPLATE_URL = new URL('../templates/consent.hbs', import.meta.url);

let compiled: Handlebars.TemplateDelegate<ConsentPageData> | null = null;

function getTemplate(): Handlebars.TemplateDelegate<ConsentPageData> {
    if (!compiled) {
        const source = readFileSync(fileURLToPath(TEMPLATE_URL), 'utf8');
        compiled = Handlebars.compile<ConsentPageData>(source);
    }
    return compiled;
}

// =============================================================================
// Template Rendering
// =============================================================================

export function renderConsentPage(params: ConsentPageParams): string {
    const data: ConsentPageData = {
        clientId: params.client.clientId,
        clientName: params.client.clientName,
        websiteUrl: params.client.websiteUrl,
        logoUrl: params.client.logoUrl,
        scopes: params.scopes,
        state: params.state,
        csrfToken: params.csrfToken,
        confirmPath: params.confirmPath || CONFIRM_PATH,
    };
    return getTemplate()(data);
}
