import { describe, it, expect } from 'vitest';
import { Blackboard, NodeStatus, action, createTree } from '@/index';

interface Memory {
    target: string;
    hits: number;
}

describe('Blackboard', () => {
    it('stores typed values', () => {
        const bb = new Blackboard<Memory>({ target: 'oak' });
        bb.set('hits', 2);

        expect(bb.get('target')).toBe('oak');
        expect(bb.get('hits')).toBe(2);
        expect(bb.keys()).toEqual(['target', 'hits']);
        expect(bb.size).toBe(2);
    });

    it('reports and deletes keys', () => {
        const bb = new Blackboard<Memory>({ hits: 1 });

        expect(bb.has('hits')).toBe(true);
        expect(bb.has('target')).toBe(false);
        expect(bb.delete('hits')).toBe(true);
        expect(bb.delete('hits')).toBe(false);
        expect(bb.size).toBe(0);
    });

    it('clones into an independent store', () => {
        const bb = new Blackboard<Memory>({ hits: 1 });
        const copy = bb.clone();
        copy.set('hits', 5);

        expect(bb.get('hits')).toBe(1);
        expect(copy.get('hits')).toBe(5);
    });

    it('is shared by every node of a tree', () => {
        const bb = new Blackboard();
        const tree = createTree(action(node => {
            node.blackboard?.set('visited', true);
            return NodeStatus.SUCCESS;
        }), { blackboard: bb });
        tree.start();
        tree.update();

        expect(bb.get('visited')).toBe(true);
        expect(tree.blackboard).toBe(bb);
    });
});
