/**
 * Safety Checker
 *
 * Static gate run before any code reaches the executor.
 * Walks the syntax tree in source order and reports the first denied construct.
 * A refused fragment is never executed.
 */

import ts from 'typescript';
import type { SafetyPolicy, SafetyVerdict, SafetyViolation, ViolationCategory } from './types.js';
import { DEFAULT_SAFETY_POLICY } from './policy.js';
import { collectDeclaredNames, lineOf, parseFragment } from './syntax.js';

const MAGIC_LINE = /^\s*(%%?[A-Za-z][\w-]*)/;
const BANG_LINE = /^\s*!{1,2}\s*([A-Za-z][\w.-]*)/;

function lookup(record: Record<string, ViolationCategory>, key: string): ViolationCategory | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

function normalizeModule(specifier: string): string {
  return specifier.startsWith('node:') ? specifier.slice('node:'.length) : specifier;
}

/**
 * Check a module specifier against the policy
 */
export function checkModule(
  specifier: string,
  policy: SafetyPolicy
): { category: ViolationCategory; reason: string } | null {
  const name = normalizeModule(specifier);
  const base = name.split('/')[0] ?? name;

  const denied = lookup(policy.deniedModules, name) ?? lookup(policy.deniedModules, base);
  if (denied) {
    return { category: denied, reason: `Module "${specifier}" is not allowed (${denied})` };
  }
  if (!policy.allowedModules.includes(name)) {
    return { category: 'dynamic-import', reason: `Module "${specifier}" is not on the allow list` };
  }
  return null;
}

function findShellEscape(code: string, policy: SafetyPolicy): SafetyViolation | null {
  const lines = code.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';

    const magic = MAGIC_LINE.exec(line);
    if (magic?.[1]) {
      return {
        category: 'shell-escape',
        construct: magic[1],
        line: i + 1,
        reason: `Notebook magic ${magic[1]} is not allowed`,
      };
    }

    const bang = BANG_LINE.exec(line);
    if (bang?.[1] && policy.shellCommands.includes(bang[1])) {
      return {
        category: 'shell-escape',
        construct: line.trim(),
        line: i + 1,
        reason: `Shell command "${bang[1]}" is not allowed`,
      };
    }
  }
  return null;
}

/** Identifier positions that name something rather than read a binding */
function isNonReference(node: ts.Identifier): boolean {
  const parent = node.parent;
  if (!parent) return false;

  if (
    (ts.isPropertyAccessExpression(parent) ||
      ts.isPropertyAssignment(parent) ||
      ts.isMethodDeclaration(parent) ||
      ts.isPropertyDeclaration(parent) ||
      ts.isGetAccessorDeclaration(parent) ||
      ts.isSetAccessorDeclaration(parent) ||
      ts.isPropertySignature(parent) ||
      ts.isMethodSignature(parent) ||
      ts.isEnumMember(parent)) &&
    parent.name === node
  ) {
    return true;
  }

  if (ts.isBindingElement(parent) && parent.propertyName === node) return true;
  if (ts.isQualifiedName(parent) && parent.right === node) return true;
  if (ts.isLabeledStatement(parent) || ts.isBreakOrContinueStatement(parent)) return true;
  if (ts.isTypeReferenceNode(parent)) return true;
  if (ts.isImportSpecifier(parent) || ts.isImportClause(parent) || ts.isNamespaceImport(parent)) return true;

  return false;
}

function isRequireCall(node: ts.Identifier): boolean {
  const parent = node.parent;
  return !!parent && ts.isCallExpression(parent) && parent.expression === node;
}

/**
 * Check a code fragment against the deny-list
 */
export function checkSafety(code: string, policy: SafetyPolicy = DEFAULT_SAFETY_POLICY): SafetyVerdict {
  const shellEscape = findShellEscape(code, policy);
  if (shellEscape) {
    return { allowed: false, violation: shellEscape };
  }

  const sourceFile = parseFragment(code);
  const declared = collectDeclaredNames(sourceFile);
  const found: { violation: SafetyViolation | null } = { violation: null };

  const deny = (node: ts.Node, category: ViolationCategory, construct: string, reason: string): void => {
    found.violation = { category, construct, line: lineOf(sourceFile, node), reason };
  };

  const checkSpecifier = (node: ts.Node, specifier: ts.Expression | undefined, construct: (s: string) => string): void => {
    if (!specifier || !ts.isStringLiteralLike(specifier)) return;
    const denied = checkModule(specifier.text, policy);
    if (denied) deny(node, denied.category, construct(specifier.text), denied.reason);
  };

  const visit = (node: ts.Node): void => {
    if (found.violation) return;

    if (ts.isImportDeclaration(node) || ts.isExportDeclaration(node)) {
      checkSpecifier(node, node.moduleSpecifier, (s) => `import '${s}'`);
    } else if (ts.isImportEqualsDeclaration(node) && ts.isExternalModuleReference(node.moduleReference)) {
      checkSpecifier(node, node.moduleReference.expression, (s) => `import '${s}'`);
    } else if (ts.isCallExpression(node)) {
      if (node.expression.kind === ts.SyntaxKind.ImportKeyword && policy.denyDynamicImport) {
        deny(node, 'dynamic-import', 'import()', 'Dynamic import() is not allowed');
      } else if (ts.isIdentifier(node.expression) && node.expression.text === 'require' && !declared.has('require')) {
        const [arg] = node.arguments;
        if (arg && ts.isStringLiteralLike(arg)) {
          checkSpecifier(node, arg, (s) => `require('${s}')`);
        } else {
          deny(node, 'dynamic-import', 'require(...)', 'require() needs a literal module name');
        }
      }
    } else if (ts.isWithStatement(node) && policy.denyWith) {
      deny(node, 'introspection', 'with', 'with statements are not allowed');
    } else if (ts.isPropertyAccessExpression(node) && policy.deniedProperties.includes(node.name.text)) {
      deny(node, 'introspection', `.${node.name.text}`, `Access to .${node.name.text} is not allowed`);
    } else if (
      ts.isElementAccessExpression(node) &&
      ts.isStringLiteralLike(node.argumentExpression) &&
      policy.deniedProperties.includes(node.argumentExpression.text)
    ) {
      const name = node.argumentExpression.text;
      deny(node, 'introspection', `['${name}']`, `Access to .${name} is not allowed`);
    } else if (ts.isBindingElement(node)) {
      const key = node.propertyName ?? node.name;
      if (ts.isIdentifier(key) && policy.deniedProperties.includes(key.text)) {
        deny(node, 'introspection', key.text, `Access to .${key.text} is not allowed`);
      }
    } else if (ts.isIdentifier(node) && !isNonReference(node) && !declared.has(node.text)) {
      const category = lookup(policy.deniedGlobals, node.text);
      if (category) {
        deny(node, category, node.text, `Use of ${node.text} is not allowed (${category})`);
      } else if (node.text === 'require' && !isRequireCall(node)) {
        deny(node, 'dynamic-import', 'require', 'require may only be called with a literal module name');
      }
    }

    if (!found.violation) ts.forEachChild(node, visit);
  };
  visit(sourceFile);

  if (found.violation) {
    return { allowed: false, violation: found.violation };
  }
  return { allowed: true };
}
