/**
 * Abstract Syntax Tree (AST) Types for propositional formulas
 */

export type BinaryConnective = 'and' | 'or' | 'implies' | 'iff';

export type FormulaType = 'variable' | 'not' | BinaryConnective;

export interface VariableNode {
    readonly type: 'variable';
    readonly name: string;
}

export interface NotNode {
    readonly type: 'not';
    readonly operand: Formula;
}

export interface BinaryNode {
    readonly type: BinaryConnective;
    readonly left: Formula;
    readonly right: Formula;
}

/**
 * A propositional formula. The variant set is fixed by the grammar.
 */
export type Formula = VariableNode | NotNode | BinaryNode;
