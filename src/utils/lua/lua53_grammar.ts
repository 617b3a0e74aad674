import {
  PegGrammar,
  PegRule,
  digit,
  disable,
  eof,
  eolf,
  identifierFirst,
  identifierOther,
  ifMust,
  istr,
  list,
  listMust,
  listTail,
  longBracket,
  must,
  notAt,
  notOne,
  one,
  opt,
  pad,
  padOpt,
  plus,
  ref,
  repOpt,
  seq,
  sor,
  space,
  star,
  str,
  two,
  until,
  at,
  xdigit,
} from "../peg/peg_rules";
import { LuaKeyword, kLuaKeywords, keywordsInMatchOrder } from "./lua_keywords";

// PEG for Lua 5.3 plus the cartridge dialect (`!=`, `a += b`, `if (c) stmt`).
//
// Lexer and parser are one grammar. Most rules consume only "internal" padding
// (whitespace and comments inside the construct), leaving padding around them to the caller.
// Binary operator levels consume padding on their right, which is cheaper than
// re-trying it at every level.
//
// Left recursion in the Lua manual grammar (prefixexp / var / functioncall) is replaced by a
// single suffixed expression: a bracketed expression or a name, then any number of
// call or index tails. Whether a statement is an assignment or a call is only known at the
// last tail; the statement alternatives re-parse the same prefix instead of backtracking into it.
// The tails and bracketed expressions are memoized, so function literals nested in call
// arguments are parsed once whatever the nesting depth.

// Rules the fixer attaches actions to.
export const kLua53Rules = {
  notEqual: "notEqualOperator",
  compoundAssignment: "compoundAssignment",
  compoundOperator: "compoundAssignmentOperator",
  shortIf: "shortIfStatement",
} as const;

const sep = ref("sep");
const seps = ref("seps");
const name = ref("name");
const expression = ref("expression");
const statement = ref("statement");
const functionBody = ref("functionBody");
const bracketExpr = ref("bracketExpr");
const variable = ref("variable");
const exprListMust = ref("exprListMust");

function key(keyword: LuaKeyword): PegRule {
  return ref(`key_${keyword}`);
}

// op `o` not followed by one of `next`
function opOne(o: string, next: string): PegRule {
  return seq(one(o), at(notOne(next)));
}

function opTwo(o: string, next: string): PegRule {
  return seq(str(o), at(notOne(next)));
}

function leftAssoc(operand: PegRule, operator: PegRule): PegRule {
  return seq(operand, seps, star(ifMust(operator, seps, operand, seps)));
}

function exponent(marker: PegRule): PegRule {
  return opt(ifMust(marker, opt(one("+-")), plus(digit)));
}

function numeral(digits: PegRule, marker: PegRule): PegRule {
  const integerFirst = seq(plus(digits), opt(one("."), star(digits)), exponent(marker));
  const fractionOnly = seq(ifMust(one("."), plus(digits)), exponent(marker));
  return sor(integerFirst, fractionOnly);
}

function shortString(quote: string): PegRule {
  return ifMust(one(quote), until(one(quote), ref("character")));
}

// statements until `terminator`, with an optional trailing return just before it.
function statementList(terminator: PegRule): PegRule {
  return seq(seps, until(sor(terminator, ifMust(key("return"), ref("returnStatement"), terminator)), statement, seps));
}

function defineRules(): Map<string, PegRule> {
  const rules = new Map<string, PegRule>();
  const define = (ruleName: string, rule: PegRule) => {
    if (rules.has(ruleName)) {
      throw new Error(`Duplicate grammar rule: ${ruleName}`);
    }
    rules.set(ruleName, rule);
  };

  // padding
  define("shortComment", until(eolf));
  define("longString", longBracket("[", "=", "]"));
  define("comment", disable(two("-"), sor(ref("longString"), ref("shortComment"))));
  define("sep", sor(space, ref("comment")));
  define("seps", star(sep));

  // keywords and names
  for (const keyword of kLuaKeywords) {
    define(`key_${keyword}`, seq(str(keyword), notAt(identifierOther)));
  }
  define("keyword", seq(sor(...keywordsInMatchOrder().map((keyword) => str(keyword))), notAt(identifierOther)));
  define("identifier", seq(identifierFirst, star(identifierOther)));
  define("name", seq(notAt(ref("keyword")), ref("identifier")));
  define("threeDots", str("..."));

  // literals
  define(
    "escaped",
    ifMust(
      one("\\"),
      sor(
        ifMust(one("x"), xdigit, xdigit),
        ifMust(digit, repOpt(2, digit)),
        ifMust(one("u"), one("{"), plus(xdigit), one("}")),
        sor(str("\r\n"), str("\n\r")),
        one("abfnrtv\\\"'0\r\n"),
        seq(one("z"), star(space)),
      ),
    ),
  );
  define("character", sor(ref("escaped"), notOne("\r\n")));
  define("literalString", sor(shortString('"'), shortString("'"), ref("longString")));
  define("decimal", numeral(digit, one("eE")));
  define("hexadecimal", ifMust(istr("0x"), numeral(xdigit, one("pP"))));
  define("numeral", sor(ref("hexadecimal"), ref("decimal")));

  // lists
  define("nameList", list(name, one(","), sep));
  define("nameListMust", listMust(name, one(","), sep));
  define("exprListMust", listMust(expression, one(","), sep));

  // tables and functions
  define(
    "tableField",
    sor(
      ifMust(one("["), seps, expression, seps, one("]"), seps, one("="), seps, expression),
      ifMust(seq(name, seps, opOne("=", "=")), seps, expression),
      expression,
    ),
  );
  define("tableConstructor", ifMust(one("{"), padOpt(listTail(ref("tableField"), one(",;"), sep), sep), one("}")));
  define(
    "parameterList",
    sor(ref("threeDots"), seq(ref("nameList"), opt(ifMust(pad(one(","), sep), ref("threeDots"))))),
  );
  define("functionBody", seq(one("("), padOpt(ref("parameterList"), sep), one(")"), seps, ref("blockUntilEnd")));
  define("functionLiteral", ifMust(key("function"), seps, functionBody));

  // suffixed expressions
  define("bracketExpr", ifMust(one("("), seps, expression, seps, one(")")));
  define("functionArgs", sor(ifMust(one("("), padOpt(exprListMust, sep), one(")")), ref("tableConstructor"), ref("literalString")));
  define(
    "variableTail",
    sor(ifMust(one("["), seps, expression, seps, one("]")), ifMust(seq(notAt(two(".")), one(".")), seps, name)),
  );
  define(
    "functionCallTail",
    sor(ref("functionArgs"), ifMust(seq(notAt(two(":")), one(":")), seps, name, seps, ref("functionArgs"))),
  );
  define("variableHead", sor(name, seq(bracketExpr, seps, ref("variableTail"))));
  define("variable", seq(ref("variableHead"), star(star(seps, ref("functionCallTail")), seps, ref("variableTail"))));
  define(
    "functionCall",
    seq(sor(name, bracketExpr), plus(until(seq(seps, ref("functionCallTail")), seps, ref("variableTail")))),
  );

  // expressions, highest precedence first
  define("suffixedExpr", seq(sor(bracketExpr, name), star(seps, sor(ref("functionCallTail"), ref("variableTail")))));
  define(
    "simpleExpr",
    sor(
      key("nil"),
      key("true"),
      key("false"),
      ref("threeDots"),
      ref("numeral"),
      ref("literalString"),
      ref("functionLiteral"),
      ref("suffixedExpr"),
      ref("tableConstructor"),
    ),
  );
  define("powerExpr", seq(ref("simpleExpr"), seps, opt(one("^"), seps, ref("unaryExpr"), seps)));
  define("unaryOperator", sor(one("-"), one("#"), opOne("~", "="), key("not")));
  define("unaryExpr", sor(ifMust(ref("unaryOperator"), seps, ref("unaryExpr"), seps), ref("powerExpr")));
  define("mulExpr", leftAssoc(ref("unaryExpr"), sor(two("/"), one("/"), one("*"), one("%"))));
  define("addExpr", leftAssoc(ref("mulExpr"), sor(one("+"), one("-"))));
  define("concatExpr", seq(ref("addExpr"), seps, opt(ifMust(opTwo("..", "."), seps, ref("concatExpr")))));
  define("shiftExpr", leftAssoc(ref("concatExpr"), sor(two("<"), two(">"))));
  define("bandExpr", leftAssoc(ref("shiftExpr"), one("&")));
  define("bxorExpr", leftAssoc(ref("bandExpr"), opOne("~", "=")));
  define("borExpr", leftAssoc(ref("bxorExpr"), one("|")));
  define("notEqualOperator", str("!="));
  define(
    "comparisonOperator",
    sor(two("="), str("<="), str(">="), opOne("<", "<"), opOne(">", ">"), ref("notEqualOperator"), str("~=")),
  );
  define("comparisonExpr", leftAssoc(ref("borExpr"), ref("comparisonOperator")));
  define("andExpr", leftAssoc(ref("comparisonExpr"), key("and")));
  define("expression", leftAssoc(ref("andExpr"), key("or")));

  // blocks
  define("returnStatement", seq(padOpt(exprListMust, sep), opt(one(";"), seps)));
  define("blockUntilEnd", statementList(key("end")));
  define("blockUntilUntil", statementList(key("until")));
  define("atElseifElseEnd", sor(at(key("elseif")), at(key("else")), at(key("end"))));
  define("blockUntilElse", statementList(ref("atElseifElseEnd")));
  define("chunkBlock", statementList(eof));

  // statements
  define("labelStatement", ifMust(two(":"), seps, name, seps, two(":")));
  define("gotoStatement", ifMust(key("goto"), seps, name));
  define("doStatement", ifMust(key("do"), ref("blockUntilEnd")));
  define("whileStatement", ifMust(key("while"), seps, expression, seps, key("do"), ref("blockUntilEnd")));
  define("repeatStatement", ifMust(key("repeat"), ref("blockUntilUntil"), seps, expression));
  define(
    "elseifClause",
    ifMust(key("elseif"), seps, expression, seps, key("then"), ref("blockUntilElse")),
  );
  define("elseClause", ifMust(key("else"), ref("blockUntilEnd")));
  define(
    "ifStatement",
    ifMust(
      key("if"),
      seps,
      expression,
      seps,
      key("then"),
      ref("blockUntilElse"),
      seps,
      until(sor(ref("elseClause"), key("end")), ref("elseifClause"), seps),
    ),
  );
  // `if (cond) stmt...` without then/end; runs to end of line or to an `end` closing the enclosing block.
  // Recognized so it can be reported; the body is skipped token by token, not parsed.
  define(
    "shortIfStatement",
    seq(
      key("if"),
      seps,
      notAt(expression, seps, key("then")),
      bracketExpr,
      star(one(" \t")),
      until(
        at(sor(eolf, key("end"), two("-"))),
        sor(ref("literalString"), ref("identifier"), notOne("\r\n")),
      ),
    ),
  );
  define(
    "forStatement",
    ifMust(
      key("for"),
      seps,
      sor(
        seq(
          name,
          seps,
          one("="),
          seps,
          expression,
          seps,
          one(","),
          seps,
          expression,
          padOpt(ifMust(one(","), seps, expression), sep),
          key("do"),
          ref("blockUntilEnd"),
        ),
        seq(ref("nameListMust"), seps, key("in"), seps, exprListMust, seps, key("do"), ref("blockUntilEnd")),
      ),
    ),
  );
  define("compoundAssignmentOperator", sor(str("+="), str("-="), str("*="), str("/="), str("%=")));
  define("compoundAssignment", seq(variable, seps, ref("compoundAssignmentOperator"), seps, exprListMust));
  define("assignmentValues", ifMust(one("="), seps, exprListMust));
  define("assignment", seq(listMust(variable, one(","), sep), seps, ref("assignmentValues")));
  define("functionName", seq(list(name, one("."), sep), seps, opt(ifMust(one(":"), seps, name, seps))));
  define("functionDefinition", ifMust(key("function"), seps, ref("functionName"), functionBody));
  define(
    "localStatement",
    ifMust(
      key("local"),
      seps,
      sor(
        ifMust(key("function"), seps, name, seps, functionBody),
        ifMust(ref("nameListMust"), seps, opt(ref("assignmentValues"))),
      ),
    ),
  );
  define(
    "statement",
    sor(
      one(";"),
      ref("assignment"),
      ref("compoundAssignment"),
      ref("functionCall"),
      ref("labelStatement"),
      key("break"),
      ref("gotoStatement"),
      ref("doStatement"),
      ref("whileStatement"),
      ref("repeatStatement"),
      ref("shortIfStatement"),
      ref("ifStatement"),
      ref("forStatement"),
      ref("functionDefinition"),
      ref("localStatement"),
    ),
  );

  // top level
  define("interpreterLine", seq(one("#"), until(eolf)));
  define("chunk", must(opt(ref("interpreterLine")), ref("chunkBlock")));

  return rules;
}

let lua53Grammar: PegGrammar | null = null;

export function getLua53Grammar(): PegGrammar {
  if (!lua53Grammar) {
    lua53Grammar = new PegGrammar(defineRules(), {
      start: "chunk",
      padding: ["sep"],
      memoize: ["bracketExpr", "functionCallTail", "variableTail"],
    });
  }
  return lua53Grammar;
}
