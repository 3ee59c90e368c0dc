import { Artifact } from "./Artifact";
import { Device } from "./Device";
import { Registration } from "./Registration";
import { ErrorLog } from "./ErrorLog";
import { UserPersonalization } from "./UserPersonalization";

export { Artifact, Device, Registration, ErrorLog, UserPersonalization };

export const walletEntities = [Artifact, Device, Registration, ErrorLog, UserPersonalization];
