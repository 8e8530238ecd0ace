#!/usr/bin/env node
// Command line front end: generate, solve, rate and count puzzles given as 81-character strings
import { parseArgs } from 'node:util';
import { consoleLogger } from './Logger';
import { decodePuzzleCode } from './PuzzleCode';
import { PuzzleInstance } from './PuzzleInstance';
import { logicalSolve, rate } from './index';
import { Board } from './solver/Board';
import { isTier, tierForRating, tierInfo } from './solver/Difficulty';
import { generateAsync } from './solver/Generator';
import { DispatchState } from './solver/Enums/DispatchState';
import { parseBoard, serializeGrid } from './solver/GridFormat';
import { cellName } from './solver/SolveUtility';
import { isSymmetryMode } from './solver/Symmetry';
import { countSolutions } from './solver/Verifier';

function printHelp() {
    console.log('Usage: sudoku <command> [options]');
    console.log();
    console.log('Commands:');
    console.log();
    console.log('    generate           Generate a puzzle.');
    console.log('        --difficulty <tier>   beginner, easy, medium, intermediate, hard, expert, master or extreme (default: medium).');
    console.log('        --symmetry <mode>     none, rotational180, rotational90, horizontal, vertical or diagonal.');
    console.log('        --seed <n>            Seed for a reproducible puzzle.');
    console.log('        --verbose, -v         Log every attempt.');
    console.log('    solve <grid>       Solve logically, printing every step.');
    console.log('    rate <grid>        Print the difficulty rating.');
    console.log('    count <grid>       Print 0, 1 or 2 (two or more solutions).');
    console.log('    code <code>        Regenerate the puzzle for a shared code.');
    console.log();
    console.log("Grids are 81 characters, row by row, with '.' or '0' for empty cells.");
}

// Prints the reason a grid could not be read, or returns the board
function readBoard(text: string | undefined): Board | null {
    if (text === undefined) {
        console.error('Missing grid argument');
        return null;
    }
    const parsed = parseBoard(text);
    if (parsed.result === 'invalid format') {
        console.error(parsed.position === undefined ? `Invalid grid: ${parsed.reason}` : `Invalid grid at ${parsed.position}: ${parsed.reason}`);
        return null;
    }
    if (parsed.result === 'rule violation') {
        console.error(`Invalid grid: ${parsed.value} at ${cellName(parsed.cell)} repeats ${parsed.conflicts.map(cellName).join(', ')}`);
        return null;
    }
    return parsed.board;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
    const args = parseArgs({
        args: argv,
        options: {
            difficulty: { type: 'string', short: 'd', default: 'medium' },
            symmetry: { type: 'string', short: 's' },
            seed: { type: 'string' },
            verbose: { type: 'boolean', short: 'v' },
            help: { type: 'boolean', short: 'h' },
        },
        allowPositionals: true,
    });

    const [command, input] = args.positionals;
    if (args.values.help || command === undefined) {
        printHelp();
        return command === undefined && !args.values.help ? 1 : 0;
    }

    switch (command) {
        case 'generate': {
            const { difficulty, symmetry, seed } = args.values;
            if (!isTier(difficulty)) {
                console.error(`Unknown difficulty '${difficulty}'`);
                return 1;
            }
            if (symmetry !== undefined && !isSymmetryMode(symmetry)) {
                console.error(`Unknown symmetry '${symmetry}'`);
                return 1;
            }
            const seedValue = seed === undefined ? undefined : parseInt(seed, 10);
            if (seedValue !== undefined && (!Number.isInteger(seedValue) || seedValue < 0 || seedValue >= 2 ** 32)) {
                console.error(`Seed must be an integer from 0 to ${2 ** 32 - 1}`);
                return 1;
            }
            const result = await generateAsync({
                difficulty,
                symmetry,
                seed: seedValue,
                logger: args.values.verbose ? consoleLogger : undefined,
            });
            if (result.result !== 'puzzle') {
                console.error(result.result === 'generation failed' ? `Generation failed: ${result.reason}` : 'Generation cancelled');
                return 1;
            }
            const instance = PuzzleInstance.fromGenerated(result.puzzle);
            console.log(serializeGrid(instance.givens));
            console.log(`Rating: ${instance.rating} (${tierInfo[instance.tier].name})`);
            if (instance.code !== null) {
                console.log(`Code: ${instance.code}`);
            }
            return 0;
        }
        case 'solve': {
            const board = readBoard(input);
            if (board === null) {
                return 1;
            }
            const solved = logicalSolve(board, { uniquenessVerified: countSolutions(board) === 1 });
            solved.trail.forEach((move, i) => console.log(`${i + 1}. ${move.desc}`));
            console.log(serializeGrid(solved.board));
            if (solved.invalid !== undefined) {
                console.log(`Invalid: ${solved.invalid}`);
                return 1;
            }
            console.log(solved.state === DispatchState.SOLVED ? 'Solved!' : 'No logical steps found.');
            return solved.state === DispatchState.SOLVED ? 0 : 2;
        }
        case 'rate': {
            const board = readBoard(input);
            if (board === null) {
                return 1;
            }
            const rated = rate(board);
            if (rated.result !== 'rating') {
                console.log(`Unratable (${rated.reason})`);
                return 2;
            }
            console.log(`${rated.rating} (${tierInfo[tierForRating(rated.rating)].name})`);
            return 0;
        }
        case 'count': {
            const board = readBoard(input);
            if (board === null) {
                return 1;
            }
            console.log(String(countSolutions(board)));
            return 0;
        }
        case 'code': {
            const decoded = decodePuzzleCode(input ?? '');
            if (decoded.result !== 'code') {
                console.error(`Invalid code: ${decoded.reason}`);
                return 1;
            }
            const result = await generateAsync({ difficulty: decoded.tier, symmetry: decoded.symmetry, seed: decoded.seed });
            if (result.result !== 'puzzle') {
                console.error('Generation failed');
                return 1;
            }
            console.log(serializeGrid(result.puzzle.givens));
            console.log(`Rating: ${result.puzzle.rating} (${tierInfo[result.puzzle.tier].name})`);
            return 0;
        }
        default:
            console.error(`Unknown command '${command}'`);
            printHelp();
            return 1;
    }
}

if (require.main === module) {
    main().then(
        code => {
            process.exitCode = code;
        },
        error => {
            console.error(error);
            process.exitCode = 1;
        }
    );
}
