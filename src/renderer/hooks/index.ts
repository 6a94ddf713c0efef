/**
 * Hook exports
 */

export { useCallScreen, type UseCallScreenResult } from './useCallScreen'
