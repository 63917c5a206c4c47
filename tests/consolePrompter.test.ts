import { PassThrough, Writable } from "stream";
import { ConsolePrompter } from "../src/infra/consolePrompter";

function collector() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

test('writes the question and reads one line per answer', async () => {
  const input = new PassThrough();
  const output = collector();
  const prompter = new ConsolePrompter(input, output.stream);
  input.end('commuter\nsuv\n');

  await expect(prompter.ask('Permit? ')).resolves.toBe('commuter');
  await expect(prompter.ask('Vehicle? ')).resolves.toBe('suv');
  await expect(prompter.ask('Carpool? ')).resolves.toBeNull();
  prompter.print('bye');
  prompter.close();

  expect(output.text()).toBe('Permit? Vehicle? Carpool? bye\n');
});
