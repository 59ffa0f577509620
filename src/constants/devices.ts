import type { DeviceMode, DeviceProfile } from '../types';
import { InvalidConfigurationError } from '../utils/error';

export const DEVICE_MODES: DeviceMode[] = ['auto', 'mobile', 'tablet', 'desktop'];

const DEVICE_PROFILES: Record<DeviceMode, DeviceProfile> = {
  auto: { name: 'auto', canvasSize: null, fontScale: 1 },
  // Phone screens are denser, so text gets a little larger.
  mobile: { name: 'mobile', canvasSize: { width: 1080, height: 1920 }, fontScale: 1.15 },
  tablet: { name: 'tablet', canvasSize: { width: 1536, height: 2048 }, fontScale: 1 },
  desktop: { name: 'desktop', canvasSize: { width: 1920, height: 1080 }, fontScale: 1 }
};

export function isDeviceMode(value: string): value is DeviceMode {
  return DEVICE_MODES.some((mode) => mode === value);
}

export function resolveDeviceProfile(mode: string): DeviceProfile {
  const normalized = mode.trim().toLowerCase();
  if (!isDeviceMode(normalized)) {
    throw new InvalidConfigurationError(`Unknown device mode "${mode}" (expected one of ${DEVICE_MODES.join(', ')})`);
  }
  const profile = DEVICE_PROFILES[normalized];
  return {
    ...profile,
    canvasSize: profile.canvasSize ? { ...profile.canvasSize } : null
  };
}
