import { Logger, RevertedTransactionError, RevertPolicy, TxResult, UploadPhase } from "./param";

/**
 * Decides what a mined-but-reverted transaction means for the upload.
 * Under 'warn' it is logged and the upload carries on.
 */
export function applyRevertPolicy(
    result: TxResult,
    phase: UploadPhase,
    policy: RevertPolicy,
    logger: Logger
): void {
    if (result.status === 'success') {
        logger.debug(`Tx successfully published (phase: ${phase}, hash: ${result.transactionHash})`);
        return;
    }

    if (policy === 'fail') {
        throw new RevertedTransactionError(
            `Tx published but reverted (phase: ${phase}, hash: ${result.transactionHash})`,
            result.transactionHash,
            phase
        );
    }
    logger.warn(`Tx successfully published but reverted (phase: ${phase}, hash: ${result.transactionHash})`);
}
