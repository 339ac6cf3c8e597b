// Keeps the last four characters, which match the card's last four digits.
export function maskToken(token: string | null | undefined): string {
    if (!token) {
        return '<empty>';
    }
    if (token.length <= 4) {
        return '*'.repeat(token.length);
    }
    return '*'.repeat(token.length - 4) + token.slice(-4);
}
