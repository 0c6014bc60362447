/**
 * Type declarations for logic-solver package
 *
 * logic-solver is a MiniSat-based SAT solver compiled to JavaScript and ships
 * no typings. Only the surface used here is declared.
 * https://www.npmjs.com/package/logic-solver
 */

declare module 'logic-solver' {
    namespace Logic {
        /** A variable name or an opaque term built by the operators below */
        type Formula = string | { readonly type: string };

        interface Solver {
            /**
             * Require a formula to be true.
             */
            require(...formulas: Formula[]): void;

            /**
             * Solve the constraints and return a solution, or null if unsatisfiable.
             */
            solve(): Solution | null;
        }

        interface Solution {
            /**
             * Get the assignment map from variable names to booleans.
             */
            getMap(): Record<string, boolean>;
        }
    }

    const Logic: {
        Solver: new () => Logic.Solver;
        not(operand: Logic.Formula): Logic.Formula;
        and(...operands: Logic.Formula[]): Logic.Formula;
        or(...operands: Logic.Formula[]): Logic.Formula;
        implies(a: Logic.Formula, b: Logic.Formula): Logic.Formula;
        equiv(a: Logic.Formula, b: Logic.Formula): Logic.Formula;
    };

    export = Logic;
}
