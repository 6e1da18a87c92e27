/**
 * Display State
 *
 * The single canonical value every indicator renders from.
 */

export enum DisplayState {
    Idle = 'idle',
    CameraActive = 'camera-active',
    MicActive = 'mic-active',
    BothActive = 'both-active',
    /** User muted indicators while a camera or microphone is in use */
    SuppressedActive = 'suppressed-active',
    /** User muted indicators and nothing is in use */
    SuppressedIdle = 'suppressed-idle',
}

export interface UsageInputs {
    cameraInUse: boolean;
    micInUse: boolean;
    userMuted: boolean;
}

/**
 * Map raw usage booleans to a DisplayState. Suppression is all-or-nothing:
 * any activity while muted is SuppressedActive.
 */
export function computeDisplayState({ cameraInUse, micInUse, userMuted }: UsageInputs): DisplayState {
    if (userMuted) {
        return cameraInUse || micInUse ? DisplayState.SuppressedActive : DisplayState.SuppressedIdle;
    }
    if (cameraInUse && micInUse) return DisplayState.BothActive;
    if (cameraInUse) return DisplayState.CameraActive;
    if (micInUse) return DisplayState.MicActive;
    return DisplayState.Idle;
}

export function isSuppressed(state: DisplayState): boolean {
    return state === DisplayState.SuppressedActive || state === DisplayState.SuppressedIdle;
}

export function isCameraActive(state: DisplayState): boolean {
    return state === DisplayState.CameraActive || state === DisplayState.BothActive;
}

export function isMicActive(state: DisplayState): boolean {
    return state === DisplayState.MicActive || state === DisplayState.BothActive;
}

/**
 * True when something is in use and the user has not muted indicators
 */
export function isAnyActive(state: DisplayState): boolean {
    return isCameraActive(state) || isMicActive(state);
}

/**
 * The state an indicator should render while the user has muted it
 */
export function suppress(state: DisplayState): DisplayState {
    if (isSuppressed(state)) return state;
    return isAnyActive(state) ? DisplayState.SuppressedActive : DisplayState.SuppressedIdle;
}
