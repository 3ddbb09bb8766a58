import { split } from 'shlex';
import { InstructionSyntaxError, describeError } from './errors';
import { TranscodeCommand } from './types';

// Função que quebra a instrução em palavras no estilo POSIX
// Só espaço em branco separa; aspas simples e duplas agrupam e são removidas
// ( ) ; | & < > # e $VAR ficam dentro da palavra, nada é expandido
// Aspas sem fechamento lançam InstructionSyntaxError
export function tokenizeInstruction(instruction: string): string[] {
  try {
    return split(instruction);
  } catch (error) {
    throw new InstructionSyntaxError(`Invalid transform instruction: ${describeError(error)}`, { cause: error });
  }
}

// [binaryPath, "-i", inputPath, ...instrução, outputPath]
// As flags não passam por allow-list: quem chama é responsável por elas
export function buildTranscodeCommand(
  binaryPath: string,
  inputPath: string,
  instruction: string,
  outputPath: string,
): TranscodeCommand {
  return [binaryPath, '-i', inputPath, ...tokenizeInstruction(instruction), outputPath];
}
