import type { BinaryConnective, BinaryNode, Formula, NotNode, VariableNode } from '../../types/index.js';

export function createVariable(name: string): VariableNode {
    return { type: 'variable', name };
}

export function createNot(operand: Formula): NotNode {
    return { type: 'not', operand };
}

export function createBinary(type: BinaryConnective, left: Formula, right: Formula): BinaryNode {
    return { type, left, right };
}

export function createAnd(left: Formula, right: Formula): BinaryNode {
    return createBinary('and', left, right);
}

export function createOr(left: Formula, right: Formula): BinaryNode {
    return createBinary('or', left, right);
}

export function createImplies(left: Formula, right: Formula): BinaryNode {
    return createBinary('implies', left, right);
}

export function createIff(left: Formula, right: Formula): BinaryNode {
    return createBinary('iff', left, right);
}
