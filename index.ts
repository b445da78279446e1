/**
 * Generic in-memory data structures.
 *
 * The external API is an ordered tree (`Tree`), a singly linked list
 * (`SinglyLinkedList`), and a few small generic helpers to go with them.
 */

export {Tree, newTree} from './stree';
export type {TreeNode} from './stree';
export {SinglyLinkedList, newSinglyLinkedList} from './slist';
export type {ListNode} from './slist';
export {compareOrdered, comparePerson} from './compare';
export type {Comparator, Ordered, Person} from './compare';
export {double} from './numeric';
export type {Numeric} from './numeric';
export {PrintableFloat, printPrintable} from './printable';
export type {Printable} from './printable';
