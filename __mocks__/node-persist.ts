class Storage {
    readonly items = new Map<string, unknown>();

    init = jest.fn(async () => undefined);
    getItem = jest.fn(async (key: string) => this.items.get(key));
    setItem = jest.fn(async (key: string, value: unknown) => {
        // node-persist serializes values as json
        this.items.set(key, JSON.parse(JSON.stringify(value)));
    });
    create = jest.fn().mockImplementation(() => new Storage());
}

export default new Storage();
