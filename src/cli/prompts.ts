import inquirer from 'inquirer';

interface ClarificationAnswers {
  answer: string;
}

/** Asks the user to answer a clarification question. Empty input is rejected. */
export const promptForClarification = async (question: string): Promise<string> => {
  const answers = await inquirer.prompt<ClarificationAnswers>([
    {
      type: 'input',
      name: 'answer',
      message: question,
      validate: (input: string) => input.trim().length > 0 || 'Please type an answer (Ctrl+C to stop)',
    },
  ]);
  return answers.answer.trim();
};
