import { requires } from "../../chain/errors";
import type { ICoreContract } from "../interfaces/ICoreContract";
import type { IMinterFilter } from "../interfaces/IMinter";

export const AuthErrors = {
  onlyArtist: "Only Artist",
  onlyCoreAdminACL: "Only Core AdminACL allowed",
  onlyMinterFilterAdminACL: "Only MinterFilter AdminACL",
};

export function onlyArtist(sender: string, projectId: number, core: ICoreContract): void {
  requires(sender === core.projectIdToArtistAddress(projectId), AuthErrors.onlyArtist);
}

export function onlyCoreAdminACL(
  sender: string,
  core: ICoreContract,
  contract: string,
  functionSelector: string,
): void {
  requires(core.adminACLAllowed(sender, contract, functionSelector), AuthErrors.onlyCoreAdminACL);
}

export function onlyMinterFilterAdminACL(
  sender: string,
  minterFilter: IMinterFilter,
  contract: string,
  functionSelector: string,
): void {
  requires(minterFilter.adminACLAllowed(sender, contract, functionSelector), AuthErrors.onlyMinterFilterAdminACL);
}
