/**
 * Interactive input, implemented by the CLI on top of readline and by tests
 * with canned answers.
 */
export interface Prompter {
  /** Ask for a line of text. An empty answer yields `defaultValue` when given. */
  ask(question: string, defaultValue?: string): Promise<string>;
  /** Ask for a value without echoing it. */
  askSecret(question: string): Promise<string>;
  confirm(question: string, defaultYes?: boolean): Promise<boolean>;
  /** Pick one of `options`. */
  choose(question: string, options: string[]): Promise<string>;
}
