#!/usr/bin/env node

import { bosonicAlgebra, CombiningAlgebra, fermionicAlgebra } from './combining-algebra';
import { LogComponent, info } from './debug-logger';
import { EncoderFn, encodeSum } from './hamiltonian';
import { LadderSum } from './ladder';
import { bravyiKitaevTerms, jordanWignerTerms, parityTerms } from './majorana-encoding';
import { constructIndexOrdered, constructNormalOrdered } from './normal-order';
import { parseLadderExpression, renderLadderSum } from './parse';
import { PauliRegisterSequence } from './pauli-register';
import {
  balancedBinaryTreeTerms,
  fenwickTreeTerms,
  linearTreeTerms,
  ternaryTreeTerms,
} from './tree-encoding';

export const ENCODERS: Readonly<Record<string, EncoderFn>> = {
  jw: jordanWignerTerms,
  bk: bravyiKitaevTerms,
  parity: parityTerms,
  binary: balancedBinaryTreeTerms,
  ternary: ternaryTreeTerms,
  linear: linearTreeTerms,
  fenwick: fenwickTreeTerms,
};

function usage(): string {
  return `Usage: fermion-encode [COMMAND] [OPTIONS] <args>

COMMANDS:
  encode <scheme> <n> <expr>   Encode a ladder expression on n qubits
  normal <expr>                Normal order a ladder expression
  index <expr>                 Normal order, then sort by mode index
  help                         Show this help message

OPTIONS:
  -h, --help                   Show help message
  --bosonic                    Use commutation instead of anticommutation (normal, index)
  --tolerance <x>              Drop Pauli terms with |coefficient| <= x (encode)

SCHEMES:
  ${Object.keys(ENCODERS).join(', ')}

EXAMPLES:
  fermion-encode encode jw 4 "[(u, 0) | (d, 1)]"
  fermion-encode normal "[(d, 0) | (u, 0)]"
  fermion-encode index "{[(u, 2) | (u, 0)]; 0.5 [(d, 1)]}"

EXPRESSION SYNTAX:
  Unit:               (u, 3)  (d, 0)  (I, 0)
  Product:            [(u, 0) | (d, 1)]   or with a coefficient: -0.5 [(u, 0)]
  Sum:                {[(u, 0)]; 2 [(d, 1)]}
`;
}

export interface CliResult {
  exitCode: number;
  output: string;
}

function optionValue(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  if (i < 0) return undefined;
  const value = args[i + 1];
  args.splice(i, 2);
  if (value === undefined) throw new Error(`Missing value for ${name}`);
  return value;
}

function flag(args: string[], name: string): boolean {
  const i = args.indexOf(name);
  if (i >= 0) args.splice(i, 1);
  return i >= 0;
}

function reorder(
  construct: (algebra: CombiningAlgebra, sum: LadderSum) => LadderSum | undefined,
  algebra: CombiningAlgebra,
  expr: string
): string {
  const result = construct(algebra, parseLadderExpression(expr));
  if (result === undefined) throw new Error(`The ${algebra.name} algebra could not order '${expr}'`);
  return renderLadderSum(result);
}

function encodeCommand(args: string[], tolerance: number | undefined): string {
  const [scheme, nStr, expr] = args;
  if (scheme === undefined || nStr === undefined || expr === undefined)
    throw new Error('encode needs <scheme> <n> <expr>');
  const encode = ENCODERS[scheme];
  if (encode === undefined) throw new Error(`Unknown scheme '${scheme}'`);
  const n = Number(nStr);
  if (!Number.isInteger(n) || n < 1) throw new Error(`Invalid qubit count '${nStr}'`);
  const encoded: PauliRegisterSequence = encodeSum(encode, parseLadderExpression(expr), n);
  const result = tolerance === undefined ? encoded : encoded.prune(tolerance);
  return result.size === 0 ? '0' : result.toString();
}

/** Runs one command; `argv` excludes the node binary and script path. */
export function run(argv: readonly string[]): CliResult {
  const args = [...argv];
  if (args.length === 0 || flag(args, '-h') || flag(args, '--help') || args[0] === 'help') {
    return { exitCode: 0, output: usage() };
  }

  try {
    const bosonic = flag(args, '--bosonic');
    const tolStr = optionValue(args, '--tolerance');
    const tolerance = tolStr === undefined ? undefined : Number(tolStr);
    if (tolerance !== undefined && !(tolerance >= 0)) throw new Error(`Invalid tolerance '${tolStr}'`);
    const algebra = bosonic ? bosonicAlgebra : fermionicAlgebra;
    const [command, ...rest] = args;
    info(LogComponent.CLI, `command ${command}`);

    switch (command) {
      case 'encode':
        return { exitCode: 0, output: encodeCommand(rest, tolerance) };
      case 'normal':
      case 'index': {
        const expr = rest[0];
        if (expr === undefined) throw new Error('Missing expression argument');
        const construct = command === 'normal' ? constructNormalOrdered : constructIndexOrdered;
        return { exitCode: 0, output: reorder(construct, algebra, expr) };
      }
      default:
        return { exitCode: 1, output: `Unrecognised command '${command}'. Use "fermion-encode help".` };
    }
  } catch (error) {
    return {
      exitCode: 1,
      output: `Error: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

function main() {
  const { exitCode, output } = run(process.argv.slice(2));
  if (output) (exitCode === 0 ? console.log : console.error)(output);
  process.exit(exitCode);
}

if (require.main === module) {
  main();
}
