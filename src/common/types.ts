export type TenantId = string;

export const ROLES = ['owner', 'admin', 'member'] as const;

export type Role = (typeof ROLES)[number];

export const FINANCE_ROLES: readonly Role[] = ['owner', 'admin'];

export interface Identity {
	userId: string;
	tenantId: TenantId;
	role: Role;
	/** Explicit vertical allow-list. Empty or absent means no restriction configured. */
	allowedVerticals?: string[];
	financeAccess?: boolean;
}

export type VerticalId = string;

export interface VerticalField {
	name: string;
	label: string;
	type: string;
	options: string[];
}

export interface Vertical {
	id: VerticalId;
	label: string;
	description?: string;
	type?: string;
	fields: VerticalField[];
}

export interface TenantConfig {
	tenantId: TenantId;
	verticals: Vertical[];
}

export interface SequenceCounter {
	key: string;
	category: string;
	period: string;
	seq: number;
}

export type AuditValue = string | null;

export interface AuditEntry {
	id: string;
	entityId: string;
	actorId: string;
	field: string;
	oldValue: AuditValue;
	newValue: AuditValue;
	comment?: string;
	tenantId: TenantId;
	timestamp: Date;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
