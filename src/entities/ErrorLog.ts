import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from "typeorm";
import type { ArtifactFamily } from "../wallet/families";

@Entity()
export class ErrorLog {
    // Increments per row, so entries read back in the order Wallet sent them.
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: "varchar", length: 8 })
    family!: ArtifactFamily;

    @Column({ type: "text" })
    message!: string;

    @CreateDateColumn()
    createdAt!: Date;
}
