import inquirer from 'inquirer';
import type { DistinctQuestion } from 'inquirer';

export type Credentials = {
    username: string;
    password: string;
};

export type CredentialPromptFn = (questions: DistinctQuestion<Credentials>[]) => Promise<Partial<Credentials>>;

const promptWithInquirer: CredentialPromptFn = questions => inquirer.prompt<Credentials>(questions);

/**
 * Returns the user name and password, asking on the console for whichever
 * was not given on the command line or in the environment.
 *
 * @param given - Credentials already known; empty values count as missing.
 * @param promptFn - Function used to ask the user (defaults to inquirer.prompt).
 * @throws Error if a value is still empty after prompting.
 */
export async function getUserCredentials(
    given: Partial<Credentials>,
    promptFn: CredentialPromptFn = promptWithInquirer
): Promise<Credentials> {
    const questions: DistinctQuestion<Credentials>[] = [];
    if (!given.username) {
        questions.push({ type: 'input', name: 'username', message: 'Username:' });
    }
    if (!given.password) {
        questions.push({ type: 'password', name: 'password', message: 'Password:', mask: '*' });
    }

    const answers: Partial<Credentials> = questions.length > 0 ? await promptFn(questions) : {};
    const username = given.username || answers.username?.trim() || '';
    const password = given.password || answers.password || '';

    if (!username) {
        throw new Error('A user name is required to log in.');
    }
    if (!password) {
        throw new Error('A password is required to log in.');
    }
    return { username, password };
}
