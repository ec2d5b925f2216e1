/**
 * Seed a client into the DynamoDB table.
 *
 * Usage:
 *   TABLE_NAME=authcode-dev npm run seed [-- path/to/client.json]
 *
 * Mints a fresh secret on every run and prints it once. Only its hash is
 * stored.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
    Logger,
    createSystemLogger,
    describeError,
    generateSecureRandom,
    getDocClient,
    hashToken,
    requireEnv,
    storage,
} from '@authcode/shared';
import { parseClientDefinition } from './client-definition';

const DEFAULT_DEFINITION = fileURLToPath(new URL('./data/dev-client.json', import.meta.url));

async function main(): Promise<void> {
    const tableName = requireEnv(process.env, 'TABLE_NAME');
    const path = process.argv[2] || DEFAULT_DEFINITION;
    const definition = parseClientDefinition(JSON.parse(readFileSync(path, 'utf8')));

    const docClient = getDocClient(process.env.AWS_REGION || undefined);
    const clientSecret = generateSecureRandom(32);
    const item = storage.buildClientItem(definition, hashToken(clientSecret), new Date());

    const existing = await storage.getClient(docClient, tableName, definition.clientId);
    if (existing) {
        item.createdAt = existing.createdAt;
    }

    await storage.saveClient(docClient, tableName, item);
    createSystemLogger('seed-client').clientRegistered({
        clientId: definition.clientId,
        redirectUri: definition.redirectUri,
    });

    process.stdout.write(`client_id:     ${definition.clientId}\n`);
    process.stdout.write(`client_secret: ${clientSecret}\n`);
}

main().catch((err: unknown) => {
    new Logger('seed-client').error('Seeding failed', describeError(err));
    process.exitCode = 1;
});
