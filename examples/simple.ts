/**
 * Two people printed side by side with the expanded structured form.
 */
import { colprint } from '../src/index.js';

class Person {
  constructor(
    readonly name: string,
    readonly age: number,
    readonly country: string,
    readonly job: string,
    readonly hobby: string
  ) {}

  toString(): string {
    return `Name: ${this.name}\nAge: ${this.age}\nCountry: ${this.country}\nJob: ${this.job}\nHobby: ${this.hobby}`;
  }
}

const bob = new Person('Bob', 25, 'Canada', 'Data Scientist', 'Photography');
const jessica = new Person('Jessica', 28, 'USA', 'Software Engineer', 'Hiking');

await colprint('{:#?}\t{:#?}', bob, jessica);
