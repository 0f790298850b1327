export { RuleEngine, type Rule, type RuleBody } from './rule-engine.js';
export { typeFromSignRule, capitalizeDescriptionRule, builtinRules } from './builtin-rules.js';
export { createPatternRule, expandTemplate } from './pattern-rule.js';
