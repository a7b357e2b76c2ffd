/**
 * Tour of template features: separators, render modes and fixed widths.
 */
import { inspect } from 'node:util';
import { colprint } from '../src/index.js';

class Person {
  constructor(
    readonly name: string,
    readonly age: number,
    readonly bio: string
  ) {}

  toString(): string {
    return `Name: ${this.name}\nAge: ${this.age}\nBio: ${this.bio}`;
  }
}

class Stats {
  constructor(
    readonly title: string,
    readonly values: number[]
  ) {}

  toString(): string {
    return [this.title, ...this.values.map((v) => v.toFixed(2))].join('\n');
  }
}

class Task {
  constructor(
    readonly name: string,
    readonly status: string,
    readonly priority: number
  ) {}

  toString(): string {
    return `Task: ${this.name}\nStatus: ${this.status}\nPriority: ${this.priority}`;
  }

  [inspect.custom](): string {
    return `Task(${this.name}) [${this.status}] p${this.priority}`;
  }
}

const person = new Person('Alice Johnson', 30, 'Software Engineer\nLoves hiking and rock climbing\nBased in Seattle');
const stats = new Stats('Quarterly Revenue', [1234.56, 2345.67, 3456.78, 4567.89]);
const task = new Task('Complete API implementation', 'In Progress', 1);

console.log('Example 1: Basic display formatting with auto width');
await colprint('{}|{}', stats, person);

console.log('\nExample 2: Display formatting with pipe separator');
await colprint('{} | {}', stats, person);

console.log('\nExample 3: Debug formatting with pipe separator');
await colprint('{:?} | {:?}', stats, person);

console.log('\nExample 4: Pretty debug formatting at fixed widths');
await colprint('{:#?:50} | {:#?:50}', stats, person);

console.log('\nExample 5: Mixed formatting with custom separator');
await colprint('{} => {:?}', person, stats);

console.log('\nExample 6: Three columns with different separators');
await colprint('{} -> {:?} => {:#?}', person, stats, task);
