import type {Comparator} from './compare';

/**
 * Read-only view of a tree node. The tree owns its nodes; callers can walk
 * them but not rewire them.
 */
export interface TreeNode<T> {
    readonly value: T;
    readonly left: TreeNode<T> | null;
    readonly right: TreeNode<T> | null;
}

interface Node<T> {
    value: T;
    left: Node<T> | null;
    right: Node<T> | null;
}

/**
 * Unbalanced binary search tree. Smaller values go left, larger go right,
 * and inserting a value equal to a stored one replaces it.
 */
export class Tree<T> {
    #root: Node<T> | null = null;

    constructor(private readonly compare: Comparator<T>) { }

    get root(): TreeNode<T> | null {
        return this.#root;
    }

    insert(value: T): void {
        this.#root = insert(this.#root, value, this.compare);
    }

    contains(value: T): boolean {
        return contains(this.#root, value, this.compare);
    }
}

export function newTree<T>(compare: Comparator<T>): Tree<T> {
    return new Tree(compare);
}

// Returns the root after inserting; a new node only when the tree was empty.
function insert<T>(root: Node<T> | null, value: T, compare: Comparator<T>): Node<T> {
    const created: Node<T> = {value, left: null, right: null};
    if (!root) return created;
    let node = root;
    for (;;) {
        const order = compare(value, node.value);
        if (order === 0) {
            node.value = value;
            return root;
        }
        const child = order < 0 ? node.left : node.right;
        if (!child) {
            if (order < 0) node.left = created;
            else node.right = created;
            return root;
        }
        node = child;
    }
}

function contains<T>(root: Node<T> | null, value: T, compare: Comparator<T>): boolean {
    let node = root;
    while (node) {
        const order = compare(value, node.value);
        if (order === 0) return true;
        node = order < 0 ? node.left : node.right;
    }
    return false;
}
