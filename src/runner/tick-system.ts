/**
 * Interface for systems that update every frame.
 * The host frame loop owns the timing; systems only react to tick().
 */
export interface TickSystem {
    /** Called once per frame with the elapsed time in seconds */
    tick(dt: number): void;

    /**
     * Optional: called when the host shuts the system down.
     * Systems holding references to trees should release them here.
     */
    destroy?(): void;
}
