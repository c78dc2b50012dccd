/**
 * Template Filler
 *
 * Placeholders understood in a template:
 *   {input}    the primary input text
 *   {<name>}   a declared argument, filled by position or its default
 *   {argN}     the Nth positional argument (1-based) when no declared
 *              argument occupies that position
 *   {args}     every positional argument joined by single spaces
 * Anything else in braces is left as written.
 */

import { PromptArg } from '../config/schemas.js'

// Replacement through a callback so `$&` and friends in user text stay literal.
function replaceAllLiteral(text: string, placeholder: string, value: string): string {
  return text.replaceAll(placeholder, () => value)
}

export function fillTemplate(
  template: string,
  input: string,
  args: string[] = [],
  declared: PromptArg[] = []
): string {
  let result = replaceAllLiteral(template, '{input}', input)

  declared.forEach((arg, i) => {
    const value = i < args.length ? args[i] : arg.default_value
    result = replaceAllLiteral(result, `{${arg.name}}`, value)
  })

  args.forEach((arg, i) => {
    if (i >= declared.length) {
      result = replaceAllLiteral(result, `{arg${i + 1}}`, arg)
    }
  })

  return replaceAllLiteral(result, '{args}', args.join(' '))
}

const LANGUAGE_CODE = /^[A-Za-z]{2,3}$/

/**
 * Command-specific argument fix-ups, applied before filling.
 *
 * Only `translate` has one: `xa translate ja "some text"` reads naturally,
 * so when the input looks like a 2-3 letter language code and further
 * text follows, the two are swapped. This is a guess based on shape
 * alone and misfires on short words such as "hi" or "ok" followed by
 * more text.
 */
export function preprocessCommand(
  command: string,
  input: string,
  args: string[]
): { input: string; args: string[] } {
  if (command === 'translate' && args.length > 0 && LANGUAGE_CODE.test(input)) {
    return { input: args.join(' '), args: [input] }
  }
  return { input, args }
}
