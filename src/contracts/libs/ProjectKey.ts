import { toAddress } from "../../chain/accounts";
import type { KeyOf } from "../../chain/storage";

/** (core contract, project id): the key every per-project minter store is sharded by. */
export type ProjectKey = {
  projectId: number;
  coreContract: string;
};

/** Core addresses are keyed in checksum form, so any casing of the same address reads the same slot. */
export const projectKey: KeyOf<ProjectKey> = ({ projectId, coreContract }) =>
  `${toAddress(coreContract)}:${projectId}`;
