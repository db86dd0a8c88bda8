import { CapabilityRequiredError } from './errors'

export type Capability = 'manage-records' | 'enroll' | 'mark-attendance' | 'record-grade'

/**
 * Whoever calls a privileged operation. Capabilities are resolved by the
 * authorization layer; the records modules only check that one was granted.
 */
export interface Actor {
	id: string
	capabilities: ReadonlySet<Capability>
}

export function createActor(id: string, capabilities: Capability[]): Actor {
	return { id, capabilities: new Set(capabilities) }
}

export function requireCapability(actor: Actor, capability: Capability): void {
	if (!actor.capabilities.has(capability)) throw new CapabilityRequiredError(capability)
}
