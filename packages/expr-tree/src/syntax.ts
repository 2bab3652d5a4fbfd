/**
 * Unrestricted syntax tree produced by the parser.
 * Only `number`, `unary` and `binary` can survive restriction; every other kind
 * exists so that it can be recognized and rejected by name.
 */

export type UnarySymbol = '+' | '-' | '~'

export type BinarySymbol =
	| '+'
	| '-'
	| '*'
	| '/'
	| '//'
	| '%'
	| '**'
	| '@'
	| '<<'
	| '>>'
	| '&'
	| '|'
	| '^'

export type CompareSymbol = '<' | '>' | '==' | '>=' | '<=' | '!=' | 'in' | 'not in' | 'is' | 'is not'

export type ConstantValue = 'True' | 'False' | 'None' | '...'

interface Located {
	/** Offset of the first token of the node in the source string */
	readonly start: number
}

export interface NumberSyntax extends Located {
	readonly kind: 'number'
	readonly value: number
}

export interface ImaginarySyntax extends Located {
	readonly kind: 'imaginary'
	readonly text: string
}

export interface ConstantSyntax extends Located {
	readonly kind: 'constant'
	readonly value: ConstantValue
}

export interface StringSyntax extends Located {
	readonly kind: 'string'
	readonly text: string
}

export interface NameSyntax extends Located {
	readonly kind: 'name'
	readonly id: string
}

export interface UnarySyntax extends Located {
	readonly kind: 'unary'
	readonly operator: UnarySymbol
	readonly operand: SyntaxNode
}

export interface BinarySyntax extends Located {
	readonly kind: 'binary'
	readonly operator: BinarySymbol
	readonly left: SyntaxNode
	readonly right: SyntaxNode
}

export interface BooleanSyntax extends Located {
	readonly kind: 'boolean'
	readonly operator: 'and' | 'or'
	readonly values: readonly SyntaxNode[]
}

export interface NotSyntax extends Located {
	readonly kind: 'not'
	readonly operand: SyntaxNode
}

export interface CompareSyntax extends Located {
	readonly kind: 'compare'
	readonly left: SyntaxNode
	readonly operators: readonly CompareSymbol[]
	readonly comparators: readonly SyntaxNode[]
}

export interface ConditionalSyntax extends Located {
	readonly kind: 'conditional'
	readonly test: SyntaxNode
	readonly body: SyntaxNode
	readonly orelse: SyntaxNode
}

export interface LambdaSyntax extends Located {
	readonly kind: 'lambda'
	readonly parameters: readonly string[]
	readonly body: SyntaxNode
}

export interface Argument {
	/** Keyword name, or null for positional and unpacked arguments */
	readonly name: string | null
	readonly value: SyntaxNode
}

export interface CallSyntax extends Located {
	readonly kind: 'call'
	readonly callee: SyntaxNode
	readonly args: readonly Argument[]
}

export interface AttributeSyntax extends Located {
	readonly kind: 'attribute'
	readonly object: SyntaxNode
	readonly name: string
}

export interface SubscriptSyntax extends Located {
	readonly kind: 'subscript'
	readonly object: SyntaxNode
	readonly index: SyntaxNode
}

export interface SliceSyntax extends Located {
	readonly kind: 'slice'
	readonly lower: SyntaxNode | null
	readonly upper: SyntaxNode | null
	readonly step: SyntaxNode | null
}

export interface StarredSyntax extends Located {
	readonly kind: 'starred'
	readonly value: SyntaxNode
}

export interface SequenceSyntax extends Located {
	readonly kind: 'tuple' | 'list' | 'set'
	readonly elements: readonly SyntaxNode[]
}

export interface DictEntry {
	/** null for `**mapping` unpacking */
	readonly key: SyntaxNode | null
	readonly value: SyntaxNode
}

export interface DictSyntax extends Located {
	readonly kind: 'dict'
	readonly entries: readonly DictEntry[]
}

export interface ComprehensionClause {
	readonly target: SyntaxNode
	readonly iterable: SyntaxNode
	readonly conditions: readonly SyntaxNode[]
}

export interface ComprehensionSyntax extends Located {
	readonly kind: 'comprehension'
	readonly container: 'generator' | 'list' | 'set' | 'dict'
	readonly element: SyntaxNode
	/** Value expression of a dict comprehension */
	readonly value: SyntaxNode | null
	readonly clauses: readonly ComprehensionClause[]
}

export interface NamedSyntax extends Located {
	readonly kind: 'named'
	readonly target: string
	readonly value: SyntaxNode
}

export type SyntaxNode =
	| NumberSyntax
	| ImaginarySyntax
	| ConstantSyntax
	| StringSyntax
	| NameSyntax
	| UnarySyntax
	| BinarySyntax
	| BooleanSyntax
	| NotSyntax
	| CompareSyntax
	| ConditionalSyntax
	| LambdaSyntax
	| CallSyntax
	| AttributeSyntax
	| SubscriptSyntax
	| SliceSyntax
	| StarredSyntax
	| SequenceSyntax
	| DictSyntax
	| ComprehensionSyntax
	| NamedSyntax

export type SyntaxKind = SyntaxNode['kind']
