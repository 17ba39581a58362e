import { describe, it, expect } from 'vitest';
import { Case, ALL_CASES } from '../src/domain/Case.js';
import { toCase, fromCase, isCase, FromCasing } from '../src/Casing.js';

// ============================================================================
// One phrase, written in every case
// ============================================================================

const RENDERED: ReadonlyArray<readonly [Case, string]> = [
    [Case.LOWER, 'my variable 22 name'],
    [Case.UPPER, 'MY VARIABLE 22 NAME'],
    [Case.TITLE, 'My Variable 22 Name'],
    [Case.CAMEL, 'myVariable22Name'],
    [Case.PASCAL, 'MyVariable22Name'],
    [Case.UPPER_CAMEL, 'MyVariable22Name'],
    [Case.SNAKE, 'my_variable_22_name'],
    [Case.SCREAMING_SNAKE, 'MY_VARIABLE_22_NAME'],
    [Case.KEBAB, 'my-variable-22-name'],
    [Case.COBOL, 'MY-VARIABLE-22-NAME'],
    [Case.TRAIN, 'My-Variable-22-Name'],
    [Case.TOGGLE, 'mY vARIABLE 22 nAME'],
    [Case.ALTERNATING, 'mY vArIaBlE 22 nAmE'],
];

describe('Casing', () => {
    // ── Declared Source ──

    describe('fromCase().toCase()', () => {
        it('should cover every case in the fixture', () => {
            expect(RENDERED.map(([c]) => c)).toEqual(ALL_CASES);
        });

        it('should convert between every pair of cases', () => {
            for (const [target, expected] of RENDERED) {
                for (const [source, text] of RENDERED) {
                    expect(fromCase(text, source).toCase(target)).toBe(expected);
                }
            }
        });

        it('should be the identity when source and target match', () => {
            for (const [c, text] of RENDERED) {
                expect(fromCase(text, c).toCase(c)).toBe(text);
            }
        });

        it('should convert empty text to empty text', () => {
            for (const source of ALL_CASES) {
                for (const target of ALL_CASES) {
                    expect(fromCase('', source).toCase(target)).toBe('');
                }
            }
        });

        it('should split acronyms from compact cases', () => {
            expect(fromCase('XMLHttpRequest', Case.CAMEL).toCase(Case.SNAKE)).toBe('xml_http_request');
            expect(fromCase('XMLHttpRequest', Case.PASCAL).toCase(Case.SNAKE)).toBe('xml_http_request');
            expect(fromCase('XMLHttpRequest', Case.UPPER_CAMEL).toCase(Case.SNAKE)).toBe('xml_http_request');
        });

        it('should drop leading and trailing delimiters', () => {
            expect(fromCase('_leading_underscore', Case.SNAKE).toCase(Case.SNAKE)).toBe('leading_underscore');
            expect(fromCase('tailing_underscore_', Case.SNAKE).toCase(Case.SNAKE)).toBe('tailing_underscore');
            expect(fromCase('-leading-hyphen', Case.KEBAB).toCase(Case.SNAKE)).toBe('leading_hyphen');
            expect(fromCase('tailing-hyphen-', Case.KEBAB).toCase(Case.SNAKE)).toBe('tailing_hyphen');
        });

        it('should collapse repeated delimiters', () => {
            expect(fromCase('many___underscores', Case.SNAKE).toCase(Case.SNAKE)).toBe('many_underscores');
            expect(fromCase('many---hyphens', Case.KEBAB).toCase(Case.KEBAB)).toBe('many-hyphens');
        });

        it('should split a single leading or trailing capital', () => {
            expect(fromCase('aBagel', Case.CAMEL).toCase(Case.SNAKE)).toBe('a_bagel');
            expect(fromCase('teamA', Case.CAMEL).toCase(Case.SNAKE)).toBe('team_a');
        });

        it('should ignore boundaries the source case does not use', () => {
            expect(fromCase('2020-04-16_my_cat_cali', Case.SNAKE).toCase(Case.TITLE)).toBe('2020-04-16 My Cat Cali');
            expect(fromCase('ninety-nine_problems', Case.SNAKE).toCase(Case.TITLE)).toBe('Ninety-nine Problems');
        });

        it('should degrade to a single word when the source case is wrong', () => {
            expect(fromCase('my-kebab-var', Case.SNAKE).toCase(Case.TITLE)).toBe('My-kebab-var');
        });
    });

    describe('FromCasing', () => {
        it('should keep text and source', () => {
            const handle = fromCase('my-var_Name', Case.SNAKE);
            expect(handle).toBeInstanceOf(FromCasing);
            expect(handle.text).toBe('my-var_Name');
            expect(handle.source).toBe(Case.SNAKE);
        });

        it('should re-declare the source without touching the original', () => {
            const snake = fromCase('my-var_Name', Case.SNAKE);
            const kebab = snake.fromCase(Case.KEBAB);

            expect(kebab.source).toBe(Case.KEBAB);
            expect(kebab.toCase(Case.TITLE)).toBe('My Var_name');
            expect(snake.source).toBe(Case.SNAKE);
            expect(snake.toCase(Case.TITLE)).toBe('My-var Name');
        });

        it('should expose the words it sees', () => {
            expect(fromCase('IOStream', Case.PASCAL).words()).toEqual(['IO', 'Stream']);
        });
    });

    // ── Default Splitting ──

    describe('toCase()', () => {
        it('should split on every boundary', () => {
            const inputs = [
                'SuperMario64Game',
                'super-mario64-game',
                'superMario64 game',
                'Super Mario 64_game',
                'SUPERMario 64-game',
                'super_mario-64 game',
            ];
            for (const input of inputs) {
                expect(toCase(input, Case.SNAKE)).toBe('super_mario_64_game');
            }
        });

        it('should split mixed delimiters and acronyms', () => {
            expect(toCase('ABC-abc_abcAbc ABCAbc', Case.SNAKE)).toBe('abc_abc_abc_abc_abc_abc');
            expect(toCase('IOStream', Case.SNAKE)).toBe('io_stream');
            expect(toCase('myJSONParser', Case.SNAKE)).toBe('my_json_parser');
            expect(toCase('__weird--var _name-', Case.SNAKE)).toBe('weird_var_name');
        });

        it('should split digits from letters', () => {
            expect(toCase('E5150', Case.SNAKE)).toBe('e_5150');
            expect(toCase('10,000Days', Case.SNAKE)).toBe('10,000_days');
            expect(toCase('2020-04-16_my_cat_cali', Case.TITLE)).toBe('2020 04 16 My Cat Cali');
        });

        it('should keep punctuation', () => {
            expect(toCase('Hello, world!', Case.UPPER)).toBe('HELLO, WORLD!');
        });

        it('should alternate without counting digits', () => {
            expect(toCase('my variable 22 name', Case.ALTERNATING)).toBe('mY vArIaBlE 22 nAmE');
        });

        it('should convert everyday examples', () => {
            expect(toCase('ronnie james dio', Case.TITLE)).toBe('Ronnie James Dio');
            expect(toCase('Ronnie_James_dio', Case.CAMEL)).toBe('ronnieJamesDio');
            expect(toCase('RONNIE_JAMES_DIO', Case.TRAIN)).toBe('Ronnie-James-Dio');
            expect(toCase('myKebab-like-variable', Case.SNAKE)).toBe('my_kebab_like_variable');
            expect(toCase('TestVariable', Case.SNAKE)).toBe('test_variable');
        });

        it('should handle non-ASCII letters', () => {
            expect(toCase('GranatÄpfel', Case.KEBAB)).toBe('granat-äpfel');
            expect(toCase('ὈΔΥΣΣΕΎΣ', Case.LOWER)).toBe('ὀδυσσεύς');
        });

        it('should keep a trailing acronym whole', () => {
            expect(toCase('parseHTML', Case.SNAKE)).toBe('parse_html');
            expect(toCase('HTML', Case.KEBAB)).toBe('html');
        });

        it('should convert empty text to empty text', () => {
            for (const c of ALL_CASES) {
                expect(toCase('', c)).toBe('');
            }
        });
    });

    describe('isCase()', () => {
        it('should accept text already in the case', () => {
            for (const [c, text] of RENDERED) {
                expect(isCase(text, c)).toBe(true);
            }
        });

        it('should reject text in another case', () => {
            expect(isCase('myVar', Case.SNAKE)).toBe(false);
            expect(isCase('_my_var', Case.SNAKE)).toBe(false);
        });

        it('should accept empty text in every case', () => {
            for (const c of ALL_CASES) {
                expect(isCase('', c)).toBe(true);
            }
        });
    });
});
