import { fullProfile } from '../profile/Profile';
import type { DeploymentProfile } from '../profile/Profile';
import { CanonicalWireFormat } from './CanonicalWireFormat';
import { CompactWireFormat } from './CompactWireFormat';
import type { WireFormat, WireMode } from './WireFormat';

export { CanonicalWireFormat } from './CanonicalWireFormat';
export { CompactWireFormat } from './CompactWireFormat';
export type { WireFormat, WireMode, WireObject, RecoveryProbe } from './WireFormat';

export function createWireFormat(mode: WireMode, profile: DeploymentProfile = fullProfile): WireFormat {
  return mode === 'canonical' ? new CanonicalWireFormat(profile) : new CompactWireFormat(profile);
}
