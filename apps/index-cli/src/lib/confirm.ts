import { confirm, isCancel } from "@clack/prompts";

//
// Asks the user to confirm a destructive action.
// Skips the question when the user already said yes on the command line.
//
export async function confirmAction(message: string, yes: boolean | undefined): Promise<boolean> {
    if (yes) {
        return true;
    }

    const answer = await confirm({
        message,
        initialValue: false,
    });

    if (isCancel(answer)) {
        return false;
    }

    return answer;
}
