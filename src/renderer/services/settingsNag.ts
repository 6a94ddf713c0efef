import { DismissLog } from '../utils/Logger'
import type {
  CallDirection,
  CallIntegrationPreferences,
  PlatformCapabilities,
  SettingsNagVariant
} from '@/types'

interface ShouldShowSettingsNagOptions {
  direction: CallDirection
  platform: PlatformCapabilities
  preferences: CallIntegrationPreferences
}

export function shouldShowSettingsNag(options: ShouldShowSettingsNagOptions): boolean {
  const { direction, platform, preferences } = options

  if (direction !== 'incoming' || !platform.supportsCallIntegrationNag) {
    return false
  }

  return !preferences.isCallIntegrationEnabled() || preferences.isCallIntegrationPrivacyEnabled()
}

export function resolveNagVariant(preferences: CallIntegrationPreferences): SettingsNagVariant {
  return preferences.isCallIntegrationEnabled() ? 'privacy' : 'all'
}

/**
 * True once the user has touched either preference. From then on the nag is
 * fleeting instead of blocking.
 */
export function hasExplicitNagChoice(preferences: CallIntegrationPreferences): boolean {
  return preferences.isCallIntegrationEnabledSet() || preferences.isCallIntegrationPrivacySet()
}

/**
 * Writes both preferences back with their current values, so they count as
 * reviewed.
 */
export function markSettingsNagAsComplete(preferences: CallIntegrationPreferences): void {
  const enabled = preferences.isCallIntegrationEnabled()
  const privacy = preferences.isCallIntegrationPrivacyEnabled()

  preferences.setCallIntegrationEnabled(enabled)
  preferences.setCallIntegrationPrivacyEnabled(privacy)

  DismissLog.info('Settings nag marked as complete', { enabled, privacy })
}
