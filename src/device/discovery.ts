import { GattServiceInfo } from '../types';

// Lines printed by the `scan` command
export function formatServiceListing(services: GattServiceInfo[]): string[] {
  const lines = ['Listing all GATT characteristics and their properties:'];
  for (const service of services) {
    lines.push(`Service: ${service.uuid} (${service.description || 'Unknown'})`);
    for (const char of service.characteristics) {
      lines.push(`  Characteristic: ${char.uuid} (${char.description || 'Unknown'})`);
      lines.push(`    Properties: ${char.properties.join(', ')}`);
    }
  }
  return lines;
}
