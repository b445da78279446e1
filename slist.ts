/**
 * Read-only view of a list node.
 */
export interface ListNode<T> {
    readonly value: T;
    readonly next: ListNode<T> | null;
}

interface Node<T> {
    value: T;
    next: Node<T> | null;
}

/**
 * Forward-only linked list. Values are matched with `===`.
 */
export class SinglyLinkedList<T> {
    #head: Node<T> | null = null;
    #length = 0;

    get length(): number {
        return this.#length;
    }

    get head(): ListNode<T> | null {
        return this.#head;
    }

    add(value: T): void {
        this.#head = add(this.#head, value);
        this.#length += 1;
    }

    /**
     * Inserts `value` so that it sits at `position`. A position the walk never
     * reaches (past the end, negative, fractional) appends at the tail.
     */
    insert(value: T, position: number): void {
        this.#head = insert(this.#head, value, position);
        this.#length += 1;
    }

    indexOf(value: T): number {
        return indexOf(this.#head, value);
    }
}

export function newSinglyLinkedList<T>(): SinglyLinkedList<T> {
    return new SinglyLinkedList();
}

function add<T>(head: Node<T> | null, value: T): Node<T> {
    const created: Node<T> = {value, next: null};
    if (!head) return created;
    let node = head;
    while (node.next) node = node.next;
    node.next = created;
    return head;
}

// Attaches before the node at `position`, or after the last node when the
// walk runs out first.
function insert<T>(head: Node<T> | null, value: T, position: number): Node<T> {
    if (!head || position === 0) return {value, next: head};
    let prev = head;
    let current = 1;
    while (prev.next && current !== position) {
        prev = prev.next;
        current++;
    }
    prev.next = {value, next: prev.next};
    return head;
}

function indexOf<T>(head: Node<T> | null, value: T): number {
    let current = 0;
    for (let node = head; node; node = node.next) {
        if (node.value === value) return current;
        current++;
    }
    return -1;
}
