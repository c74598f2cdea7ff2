import type { ComponentCtor, Entity } from "./Types";

/**
 * Minimal component store: one map per component type, keyed by entity.
 * Components are looked up by the constructor they were added under.
 */
export class Registry
{
    private _lastId: Entity = 0;
    private readonly stores = new Map<ComponentCtor<unknown>, Map<Entity, unknown>>();

    public create(): Entity
    {
        return ++this._lastId;
    }

    /** Adds or overwrites. Returns the stored value. */
    public add<T>(e: Entity, ctor: ComponentCtor<T>, value: T): T
    {
        const store = this.stores.get(ctor) ?? new Map<Entity, unknown>();
        store.set(e, value);
        this.stores.set(ctor, store);
        return value;
    }

    public has<T>(e: Entity, ctor: ComponentCtor<T>): boolean
    {
        return this.stores.get(ctor)?.has(e) ?? false;
    }

    public get<T>(e: Entity, ctor: ComponentCtor<T>): T | undefined
    {
        const value = this.stores.get(ctor)?.get(e);
        return value instanceof ctor ? value : undefined;
    }

    /** Visits every entity holding `ctor`, in insertion order. */
    public forEach<T>(ctor: ComponentCtor<T>, fn: (component: T, e: Entity) => void): void
    {
        const store = this.stores.get(ctor);
        if (!store) return;
        for (const [e, value] of store) {
            if (value instanceof ctor) fn(value, e);
        }
    }

    public count<T>(ctor: ComponentCtor<T>): number
    {
        return this.stores.get(ctor)?.size ?? 0;
    }
}
