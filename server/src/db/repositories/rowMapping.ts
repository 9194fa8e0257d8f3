import { isRecord } from '@erpsync/shared/domain';
import type { DeadLetterResolution, MappingSyncStatus, SyncDirection, SyncLogStatus } from './types.js';

export function toMappingStatus(value: string): MappingSyncStatus {
    switch (value) {
        case 'synced':
        case 'failed':
        case 'not_found':
            return value;
        default:
            return 'pending';
    }
}

export function toSyncLogStatus(value: string): SyncLogStatus {
    switch (value) {
        case 'success':
        case 'error':
        case 'warning':
            return value;
        default:
            return 'info';
    }
}

export function toDirection(value: string): SyncDirection {
    return value === 'to_erp' || value === 'from_erp' ? value : 'internal';
}

export function toResolution(value: string | null): DeadLetterResolution | null {
    return value === 'retried' || value === 'discarded' ? value : null;
}

/** JSONB payloads come back parsed; anything but an object reads as empty */
export function toPayload(value: unknown): Record<string, unknown> {
    if (typeof value === 'string') {
        const parsed: unknown = JSON.parse(value);
        return isRecord(parsed) ? parsed : {};
    }
    return isRecord(value) ? value : {};
}

export function toJsonColumn(value: unknown): string | null {
    return value === undefined ? null : JSON.stringify(value);
}

/** Postgres unique_violation (SQLSTATE 23505) */
export function isUniqueViolation(error: unknown): boolean {
    return isRecord(error) && error.code === '23505';
}
