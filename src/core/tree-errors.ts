/** Thrown when code breaks a structural invariant of the tree, for example
 *  looking up a node before orders exist or letting a cursor leave its range. */
export class TreeStructureError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TreeStructureError';
    }
}
