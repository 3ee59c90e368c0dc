import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from "typeorm";
import type { ArtifactFamily } from "../wallet/families";

@Entity()
@Index(["family", "libraryIdentifier", "pushToken"])
export class Device {
    @PrimaryGeneratedColumn("uuid")
    id!: string;

    @Column({ type: "varchar", length: 8 })
    family!: ArtifactFamily;

    // Supplied by Wallet; not unique on its own, a device may re-register with a new token.
    @Column()
    libraryIdentifier!: string;

    @Column()
    pushToken!: string;

    @CreateDateColumn()
    createdAt!: Date;
}
