export enum DispatchState {
    SCANNING,
    APPLYING,
    STUCK,
    SOLVED,
}
