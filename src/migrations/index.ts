import { CreateSessionsTable1717200000000 } from './1717200000000-CreateSessionsTable';
import { UpgradeMessagesTable1717200000001 } from './1717200000001-UpgradeMessagesTable';
import { AddMessagesSessionIndex1717200000002 } from './1717200000002-AddMessagesSessionIndex';

// Applied in this order; the `migrations` table records how far a database got.
export const MIGRATIONS = [
    CreateSessionsTable1717200000000,
    UpgradeMessagesTable1717200000001,
    AddMessagesSessionIndex1717200000002,
];

export const SCHEMA_VERSION = MIGRATIONS.length;
