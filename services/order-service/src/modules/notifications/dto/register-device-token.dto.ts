import { RegisterDeviceTokenRequest } from "@orderdesk/types";
import { IsNotEmpty, IsString } from "class-validator";

export class RegisterDeviceTokenDto implements RegisterDeviceTokenRequest {
  @IsString({ message: "token is required" })
  @IsNotEmpty({ message: "token is required" })
  token!: string;
}
